import express from 'express';
import type { Express, NextFunction, Request, RequestHandler, Response } from 'express';
import type { Server } from 'node:http';
import { ChartQueryDto } from '../../application/dto/chart-query.dto';
import { ExtremeMoveAlertsDto } from '../../application/dto/extreme-move-alerts.dto';
import { NotificationsDto } from '../../application/dto/notifications.dto';
import { TrendRequestDto } from '../../application/dto/trend-request.dto';
import { assertValid } from '../../application/dto/validate';
import { AnalyzeTrendUseCase } from '../../application/use-cases/analyze-trend.use-case';
import { GetExtremeMovesUseCase } from '../../application/use-cases/get-extreme-moves.use-case';
import { GetIndicatorChartUseCase } from '../../application/use-cases/get-indicator-chart.use-case';
import { GetRegimeOverviewUseCase } from '../../application/use-cases/get-regime-overview.use-case';
import { SetExtremeMoveAlertsUseCase } from '../../application/use-cases/set-extreme-move-alerts.use-case';
import { SetRegimeNotificationsUseCase } from '../../application/use-cases/set-regime-notifications.use-case';
import { ValidationError } from '../../shared/errors';
import { Logger } from '../../shared/logger';

export interface HttpDependencies {
  getRegimeOverview: GetRegimeOverviewUseCase;
  setRegimeNotifications: SetRegimeNotificationsUseCase;
  getIndicatorChart: GetIndicatorChartUseCase;
  analyzeTrend: AnalyzeTrendUseCase;
  getExtremeMoves: GetExtremeMovesUseCase;
  setExtremeMoveAlerts: SetExtremeMoveAlertsUseCase;
}

const logger = new Logger('HttpServer');

/** Copies only `keys` from an untrusted body; class-validator checks the values. */
function pick(source: unknown, keys: readonly string[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  if (typeof source !== 'object' || source === null) return result;
  for (const key of keys) {
    if (key in source) result[key] = Reflect.get(source, key);
  }
  return result;
}

function queryNumber(value: unknown): number | undefined {
  return typeof value === 'string' ? Number(value) : undefined;
}

// express 4 does not forward rejected promises to the error handler
function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function createHttpApp(deps: HttpDependencies): Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok', uptimeSeconds: Math.round(process.uptime()) });
  });

  app.get(
    '/api/regime',
    asyncHandler(async (_req, res) => {
      res.json(await deps.getRegimeOverview.execute());
    }),
  );

  app.post(
    '/api/regime/notifications',
    asyncHandler(async (req, res) => {
      const dto = await assertValid(Object.assign(new NotificationsDto(), pick(req.body, ['enabled'])));
      res.json(await deps.setRegimeNotifications.execute(dto));
    }),
  );

  app.get(
    '/api/extreme-moves',
    asyncHandler(async (req, res) => {
      const limit = queryNumber(req.query.limit) ?? 10;
      if (!Number.isInteger(limit) || limit < 1 || limit > 50) {
        throw new ValidationError('limit must be an integer between 1 and 50', 'limit');
      }
      res.json(await deps.getExtremeMoves.execute(limit));
    }),
  );

  app.post(
    '/api/extreme-moves/settings',
    asyncHandler(async (req, res) => {
      const dto = await assertValid(
        Object.assign(new ExtremeMoveAlertsDto(), pick(req.body, ['severity', 'enabled'])),
      );
      res.json(await deps.setExtremeMoveAlerts.execute(dto));
    }),
  );

  app.get(
    '/api/indicators/:indicator/chart',
    asyncHandler(async (req, res) => {
      const dto = await assertValid(
        Object.assign(new ChartQueryDto(), {
          indicator: req.params.indicator.toUpperCase(),
          maxPoints: queryNumber(req.query.maxPoints),
          at: queryNumber(req.query.at),
        }),
      );
      res.json(await deps.getIndicatorChart.execute(dto));
    }),
  );

  app.post(
    '/api/trends',
    asyncHandler(async (req, res) => {
      const dto = await assertValid(
        Object.assign(new TrendRequestDto(), pick(req.body, ['price', 'sma21', 'sma50', 'sma200'])),
      );
      res.json(deps.analyzeTrend.execute(dto));
    }),
  );

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof ValidationError) {
      res.status(400).json({ error: error.message, field: error.field });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    logger.error('Unhandled HTTP error:', error);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export function startHttpServer(app: Express, port: number, host = '0.0.0.0'): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info(`HTTP server listening on ${host}:${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function closeHttpServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
