import 'dotenv/config';
import { loadConfig } from '../config';
import { ArbiterService } from '../services/arbiter';
import { buildServer } from './app';

// Start the server
const start = async () => {
  const config = loadConfig();
  const arbiter = await ArbiterService.init(config);
  const server = buildServer(arbiter, true);

  try {
    await server.listen({ port: config.server.port, host: config.server.host });
    arbiter.logger.info(`server-listening ${config.server.host}:${config.server.port}`);
  } catch (err) {
    arbiter.logger.error('server-start-failed', err);
    process.exit(1);
  }

  // server shutdown: stop accepting requests, then let in-flight jobs finish
  const shutdown = async (signal: string) => {
    arbiter.logger.info(`Got ${signal}. Graceful shutdown`, { loggedAt: new Date().toISOString() });
    try {
      await server.close();
      await arbiter.shutdown();
      process.exit(0);
    } catch (err) {
      arbiter.logger.error('server-shutdown-failed', err);
      process.exit(1);
    }
  };

  // quit on ctrl-c when running docker in terminal
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // quit properly on docker stop
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
};

start().catch((err) => {
  console.error(err);
  process.exit(1);
});
