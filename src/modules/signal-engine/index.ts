export * from './utilities';
export * from './time-series-index';
export * from './classifiers/indicator-profiles';
export * from './classifiers/zscore.classifier';
export * from './classifiers/regime.classifier';
export * from './synthesizers/trend.synthesizer';
export * from './regime-change.tracker';
export * from './extreme-move.tracker';
