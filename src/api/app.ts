import express, { Express } from 'express';
import { FeedRuntime } from '../container';
import { MetricsTracker } from '../jobs/metrics-tracker';
import { createHealthCheck } from './health';
import { createFeedRouter } from './feed';
import {
  createCorsMiddleware,
  createRateLimiter,
  errorHandler,
  RateLimitOptions,
  requestLogger,
  securityHeaders,
} from './middleware';

export interface AppOptions {
  nodeEnv?: string;
  frontendUrl?: string;
  rateLimit?: RateLimitOptions;
  tracker?: MetricsTracker;
  /** Log every request line. Default: true */
  logRequests?: boolean;
}

export function createApp(runtime: FeedRuntime, options: AppOptions = {}): Express {
  const app = express();
  const nodeEnv = options.nodeEnv ?? 'development';

  // Trust only the first proxy so rate limiting sees client addresses
  if (nodeEnv === 'production') {
    app.set('trust proxy', 1);
  }

  app.use(securityHeaders);
  app.use(express.json());
  app.use(createCorsMiddleware(options.frontendUrl, nodeEnv));
  if (options.logRequests ?? true) {
    app.use(requestLogger);
  }

  app.get('/health', createHealthCheck(runtime, options.tracker));
  app.use('/api', createRateLimiter(options.rateLimit), createFeedRouter(runtime));

  app.use(errorHandler);

  return app;
}
