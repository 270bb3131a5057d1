import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './app';
import { createOpenAIClient, prepareJobIndex } from './bootstrap';
import { JobAssistant } from './chat/assistant';
import { loadConfig } from './config';
import { PostgresApplicationRepository } from './db/postgres';
import { JobSearchEngine } from './jobs/search';

async function main() {
  const config = loadConfig();
  const openai = createOpenAIClient(config);

  console.log('🔧 Initializing job index...');
  const { catalog, index } = await prepareJobIndex(config, openai);

  const applications = new PostgresApplicationRepository({
    host: config.POSTGRES_HOST,
    port: config.POSTGRES_PORT,
    database: config.POSTGRES_DB,
    username: config.POSTGRES_USER,
    password: config.POSTGRES_PASSWORD,
  });
  await applications.setup();

  const search = new JobSearchEngine(index, catalog);
  const assistant = new JobAssistant(index, search, openai);
  const app = createApp({ index, catalog, search, assistant, applications });

  const server = serve({ fetch: app.fetch, port: config.PORT }, (info) => {
    console.log(`🚀 Server running on http://localhost:${info.port}`);
  });

  const shutdown = () => {
    server.close();
    applications
      .disconnect()
      .catch((error) => console.error('❌ Failed to close PostgreSQL connection:', error))
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
