import { createInterface } from 'node:readline';
import { parseConfigFromEnv } from './config';
import { createLogger } from './logger';
import { TableService } from './service/table-service';

const config = parseConfigFromEnv(process.env);
const logger = createLogger(config);

const table = new TableService(
  {
    write: (line) => {
      process.stdout.write(`${line}\n`);
    },
  },
  config,
  logger,
);

const rl = createInterface({ input: process.stdin, terminal: false });

const shutdown = (): void => {
  table.close();
  rl.close();
};

rl.on('line', (line) => {
  table.handleLine(line);
  if (table.isClosed) {
    rl.close();
  }
});

rl.on('close', () => {
  table.close();
  logger.flush();
});

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

logger.info({ flipIntervalMs: config.flipIntervalMs, seeded: config.seed !== undefined }, 'card table ready');
table.open();
