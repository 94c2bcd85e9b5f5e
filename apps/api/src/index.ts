import Fastify from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import staticFiles from '@fastify/static';
import { config } from './config';
import * as ws from './services/workspace';
import { mediaRoutes } from './routes/media';
import { editRoutes } from './routes/edits';
import { jobsRoutes } from './routes/jobs';

async function main() {
  // Ensure workspace directories exist
  ws.ensureWorkspace();
  ws.cleanupStaleJobs();

  const app = Fastify({
    logger: {
      level: config.logLevel,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true },
      },
    },
    bodyLimit: 1024 * 1024, // JSON requests only; uploads go through multipart
  });

  await app.register(cors, {
    origin: config.corsOrigin,
    methods: ['GET', 'POST', 'OPTIONS'],
  });

  await app.register(multipart, {
    limits: {
      fileSize: 2 * 1024 * 1024 * 1024, // 2GB
    },
  });

  // Serve finished edits
  await app.register(staticFiles, {
    root: ws.getOutputsDir(),
    prefix: '/files/outputs/',
    decorateReply: false,
  });

  // Routes
  await app.register(mediaRoutes, { prefix: '/api' });
  await app.register(editRoutes, { prefix: '/api' });
  await app.register(jobsRoutes, { prefix: '/api' });

  // Health check
  app.get('/health', async () => ({ status: 'ok', workspace: ws.getWorkspaceDir() }));

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Workspace: ${ws.getWorkspaceDir()}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
