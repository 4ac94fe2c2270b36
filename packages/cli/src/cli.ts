#!/usr/bin/env node
// ============================================================================
// @treekey/cli — Order-insensitive structural matching for XML
// ============================================================================
// Commands:
//   treekey match <lhs.xml> <rhs.xml>   → equivalent / different
//   treekey key   <file.xml> [...]      → hex document keys
//   treekey suite <cases.json>          → PASSED / FAILED per case pair
// ============================================================================

import process from 'node:process';
import { runMain } from './commands.js';

process.exitCode = runMain(process.argv.slice(2), {
  out: {
    log: (line) => console.log(line),
    error: (line) => console.error(line),
  },
  env: process.env,
  isTTY: process.stdout.isTTY === true,
});
