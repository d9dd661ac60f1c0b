#!/usr/bin/env node

import { exportIcons } from './src/icon-exporter.js';

// Optional positional argument: output directory (defaults to ./assets)
const args = process.argv.slice(2);
if (args.length > 1) {
  console.error("Usage: braces-icon [output-dir]");
  process.exit(1);
}

async function main() {
  await exportIcons({ outputDir: args[0] });
  console.log('\nAll icons generated successfully!');
}

main().catch((error) => {
  console.error("Fatal error generating icons:", error);
  process.exit(1);
});
