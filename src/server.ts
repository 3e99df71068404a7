// Server entry point
// Bootstrap one front-end process against the shared session store

import 'dotenv/config';
import { createApp } from '@/api/app.js';
import { createAuthModule } from '@/api/middleware/AuthModule.js';
import { buildAppConfig, validateConfig } from '@/utils/config.js';
import { createAuthRuntime, type AuthRuntime } from '@/infrastructure/AuthRuntime.js';

function main(): void {
  // Build configuration from environment
  const config = buildAppConfig(process.env);

  // Validate configuration
  const errors = validateConfig(config);
  if (errors.length > 0) {
    console.error('Configuration errors:');
    errors.forEach((err) => console.error(`  - ${err}`));
    process.exit(1);
  }

  console.log('Opening session datastore and credential file...');
  let runtime: AuthRuntime;
  try {
    runtime = createAuthRuntime(config);
    const stats = runtime.getStats();
    console.log(`  Registered users: ${stats.registeredUsers}`);
    console.log(`  Active sessions: ${stats.activeSessions}`);
  } catch (error) {
    console.error('Failed to initialize auth stores:', error);
    process.exit(1);
  }
  runtime.start();

  const isProduction = config.server.nodeEnv === 'production';
  const authModule = createAuthModule(runtime.authService, runtime.identities, {
    clientCookieName: config.session.clientCookieName,
    secureCookies: isProduction,
  });

  // Log startup info
  console.log('========================================');
  console.log(`  ${config.server.appName} starting...`);
  console.log('========================================');
  console.log(`  Node Env: ${config.server.nodeEnv}`);
  console.log(`  Port: ${config.server.port}`);
  console.log(`  Session store: ${config.session.dbPath}`);
  console.log(`  Credentials: ${config.credentials.path}`);
  console.log('========================================');

  const app = createApp({
    authModule,
    appName: config.server.appName,
    corsOrigins: config.server.corsOrigins,
    trustProxy: isProduction,
    logFormat: isProduction ? 'combined' : 'dev',
  });

  const server = app.listen(config.server.port, config.server.host, () => {
    console.log(`✓ Server running at http://${config.server.host}:${config.server.port}`);
    console.log(`✓ Health check: http://${config.server.host}:${config.server.port}/health`);
    console.log('========================================');
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received. Starting graceful shutdown...`);
    server.close(() => {
      console.log('✓ Server closed');
      runtime.close();
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('✗ Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('uncaughtException', (err) => {
    console.error('Uncaught Exception:', err);
    shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled Rejection:', reason);
  });
}

main();
