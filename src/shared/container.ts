import { getInjectedParams, isInjectable } from './decorators';

export type Constructor<T = unknown> = new (...args: any[]) => T;
export type Token = string | Constructor;
type FactoryFunction<T> = () => T;

interface Binding {
  factory: FactoryFunction<unknown>;
  singleton: boolean;
  instance?: unknown;
}

export class DIContainer {
  private bindings: Map<Token, Binding> = new Map();
  private static instance: DIContainer | undefined;

  static getInstance(): DIContainer {
    if (!DIContainer.instance) {
      DIContainer.instance = new DIContainer();
    }
    return DIContainer.instance;
  }

  bind<T>(token: Token, factory: FactoryFunction<T>, singleton: boolean = true): void {
    this.bindings.set(token, { factory, singleton });
  }

  /**
   * Binds a class whose constructor parameters are all `@Inject`-ed tokens.
   * Parameters are resolved in declaration order.
   */
  bindClass<T>(token: Token, constructor: Constructor<T>, singleton: boolean = true): void {
    this.bind(
      token,
      () => {
        const params = [...getInjectedParams(constructor)].sort((a, b) => a.index - b.index);
        const args = params.map(({ token: paramToken }) => this.get(paramToken));
        return new constructor(...args);
      },
      singleton,
    );
  }

  get<T>(token: Token): T {
    const binding = this.bindings.get(token);

    if (!binding) {
      if (typeof token === 'function' && isInjectable(token)) {
        this.bindClass(token, token);
        return this.get<T>(token);
      }
      throw new Error(`No binding found for token: ${typeof token === 'string' ? token : token.name}`);
    }

    if (binding.singleton && binding.instance !== undefined) {
      return binding.instance as T;
    }

    const instance = binding.factory();

    if (binding.singleton) {
      binding.instance = instance;
    }

    return instance as T;
  }

  has(token: Token): boolean {
    return this.bindings.has(token);
  }

  unbind(token: Token): void {
    this.bindings.delete(token);
  }
}
