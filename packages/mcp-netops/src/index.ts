#!/usr/bin/env node

import { main } from './cli.js';

main(process.argv.slice(2)).then((code) => {
  // null: the MCP server is running and owns the process
  if (code !== null) {
    process.exitCode = code;
  }
}).catch((err) => {
  console.error('mcp-netops failed:', err);
  process.exit(1);
});
