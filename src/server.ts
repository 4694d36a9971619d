import dotenv from 'dotenv';
import { createApp } from './api/app';
import { AppConfig, ConfigError, loadConfig } from './config';
import { createContainer } from './container';
import { gracefulShutdown, startJobScheduler } from './jobs/scheduler';
import { debugLogger } from './utils/debug-logger';

dotenv.config();

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

function start(): void {
  const config = readConfig();
  debugLogger.setEnabled(config.debug);
  const container = createContainer(config);
  const app = createApp(container, { nodeEnv: config.nodeEnv, frontendUrl: config.frontendUrl });

  const server = app.listen(config.port, config.host, () => {
    console.log(`🚀 Server running on ${config.host}:${config.port}`);
    console.log(`📊 Health check: http://localhost:${config.port}/health`);
    console.log(`📰 Feed: http://localhost:${config.port}/api/feed`);

    container.feed
      .refresh()
      .then(outcome => {
        console.log(`Initial feed load: ${outcome.status}`);
        startJobScheduler({ feed: container.feed, monitor: container.monitor });
      })
      .catch((error: unknown) => {
        console.error('Initial feed load failed:', error);
      });
  });

  const shutdown = async (): Promise<void> => {
    console.log('Shutting down gracefully...');
    await gracefulShutdown();
    container.dispose();
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', () => {
    void shutdown();
  });
  process.on('SIGINT', () => {
    void shutdown();
  });
}

start();
