#!/usr/bin/env tsx
/**
 * prepuller CLI executable
 * @module @prepuller/cli/bin
 */

import { main } from './index';

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
