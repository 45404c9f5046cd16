/**
 * Buzz Meme API Server
 *
 * Live social buzz → mood, keywords and promo memes
 */

import { loadConfig, validateConfig } from './config.js';
import { buildApp, defaultDeps } from './app.js';
import { resolveFontFamily } from './services/text-layout.js';

async function main() {
  // Load configuration
  const config = loadConfig();

  // Validate configuration
  const errors = validateConfig(config);
  if (errors.length > 0) {
    console.error('Configuration errors:');
    errors.forEach(e => console.error(`  - ${e}`));
    if (config.nodeEnv === 'production') {
      process.exit(1);
    }
  }

  // Resolve the meme font once up front so the first render isn't slower
  const family = resolveFontFamily(config.fontPath);
  console.log(`  Meme font: ${family}${config.fontPath ? ` (preferred ${config.fontPath})` : ''}`);

  // Create Fastify instance
  const fastify = await buildApp(defaultDeps(config), {
    level: config.nodeEnv === 'production' ? 'info' : 'debug',
    transport: config.nodeEnv !== 'production' ? {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    } : undefined,
  });

  // Graceful shutdown
  const shutdown = async () => {
    console.log('\nShutting down...');
    await fastify.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // Start server
  try {
    const address = await fastify.listen({
      port: config.port,
      host: config.host,
    });
    console.log(`\n  Buzz Meme API running at ${address}`);
    console.log(`   Environment: ${config.nodeEnv}`);
    console.log(`   Render limit: ${config.memeRateLimit}/min\n`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

main().catch(err => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
