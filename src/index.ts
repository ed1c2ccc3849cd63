#!/usr/bin/env node
/**
 * sourcescan CLI
 * Security scanning of source trees with rule patterns and model-assisted analysis
 */

import { runCLI } from './cli/index.js';

// Run the CLI
runCLI().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
