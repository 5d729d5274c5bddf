import { config } from './config/captcha';
import { IdleSweeper } from './security/idleSweeper';
import { createApp } from './server';
import { ChallengeManager } from './utils/challengeManager';
import { canEncode } from './utils/imageEncoder';
import { SecurityLogger } from './utils/securityLogger';

function startServer() {
  if (!canEncode(config.imageFormat)) {
    SecurityLogger.critical(`No ${config.imageFormat} encoder available; refusing to start`);
    process.exit(1);
  }

  const manager = new ChallengeManager({
    maxFailures: config.maxFailures,
    encoder: { format: config.imageFormat, quality: config.imageQuality },
  });

  let sweeper: IdleSweeper | null = null;
  if (config.idleTimeoutMs > 0) {
    sweeper = new IdleSweeper(manager, { idleMs: config.idleTimeoutMs, intervalMs: config.sweepIntervalMs });
    sweeper.start();
  }

  const app = createApp({ manager });
  const server = app.listen(config.port, () => {
    SecurityLogger.info(`Captcha server is running at http://localhost:${config.port}`, {
      details: { maxFailures: config.maxFailures, format: config.imageFormat, idleTimeoutMs: config.idleTimeoutMs },
    });
  });

  const shutdown = (signal: string) => {
    SecurityLogger.info(`Received ${signal}, shutting down`);
    sweeper?.stop();
    manager.clear();
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer();
