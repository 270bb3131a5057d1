import 'dotenv/config';
import { createOpenAIClient, prepareJobIndex } from '../bootstrap';
import { loadConfig } from '../config';

// Builds or refreshes the job index ahead of the first server start.
async function main() {
  const config = loadConfig();
  const { index } = await prepareJobIndex(config, createOpenAIClient(config));
  console.log(`🎉 Index state: ${index.state}`);
}

main().catch((error) => {
  console.error('❌ Index build failed:', error);
  process.exit(1);
});
