import * as dotenv from 'dotenv';
import { loadDemoConfig } from './config';
import { buildDemo } from './demo';

// Load environment variables
dotenv.config();

function main() {
  try {
    const config = loadDemoConfig();
    console.log('\nWelcome to the irregular board demo!\n');

    for (const section of buildDemo(config)) {
      console.log(section);
      console.log();
    }

    console.log('Boards can take any shape: add or remove cells to cut holes.\n');
  } catch (error) {
    console.error('[Demo] Failed to render boards:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

main();
