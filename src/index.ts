import dotenv from 'dotenv'; // Load environment variables from .env file
import fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { IndexRegistry } from './core/index-registry.js';
import { registerRoutes } from './api/routes.js';
import { loadConfig } from './config.js';
import { getErrorMessage } from './utils/error-utils.js';

dotenv.config();

const config = loadConfig();

const server = fastify({
  logger: config.prettyLogs
    ? { level: config.logLevel, transport: { target: 'pino-pretty' } }
    : { level: config.logLevel }
});

const registry = new IndexRegistry(server.log);

/**
 * Creates the example index from the library docs: two keyed entries,
 * handy for trying seek and range from the Swagger UI
 */
function seedDemoIndex(): void {
  registry.createIndex('demo', 'number');
  registry.putEntry('demo', 10, 'value10');
  registry.putEntry('demo', 12, 'value12');
}

async function start() {
  try {
    server.log.info('Starting ordered index service...');

    await server.register(swagger, {
      openapi: {
        openapi: '3.0.0',
        info: {
          title: 'Ordered Index API',
          description: 'Named in-memory ordered indexes with exact, nearest-neighbour and range lookups',
          version: '1.0.0',
          license: {
            name: 'MIT',
            url: 'https://opensource.org/licenses/MIT'
          }
        },
        servers: [
          {
            url: `http://localhost:${config.port}`,
            description: 'Development server'
          }
        ],
        tags: [
          { name: 'Indexes', description: 'Index management endpoints' },
          { name: 'Entries', description: 'Entry lookup and mutation endpoints' },
          { name: 'System', description: 'System health' }
        ]
      }
    });
    server.log.info('Swagger registered');

    await server.register(swaggerUi, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: false
      },
      staticCSP: true
    });
    server.log.info('Swagger UI registered');

    registerRoutes(server, registry, { maxRangeLimit: config.maxRangeLimit });
    server.log.info('Routes registered');

    if (config.seedDemoIndex) {
      seedDemoIndex();
    }

    await server.listen({ port: config.port, host: config.host });

    server.log.info(`Ordered index service running on ${config.host}:${config.port}`);
    server.log.info(`REST API: http://${config.host}:${config.port}/api`);
    server.log.info(`API Documentation: http://${config.host}:${config.port}/docs`);
  } catch (err) {
    server.log.error(`Failed to start server: ${getErrorMessage(err)}`);
    process.exit(1);
  }
}

async function shutdown(signal: string) {
  server.log.info(`${signal} received, shutting down gracefully...`);
  try {
    await server.close();
    process.exit(0);
  } catch (err) {
    server.log.error(`Error during shutdown: ${getErrorMessage(err)}`);
    process.exit(1);
  }
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

void start();
