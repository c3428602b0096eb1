#!/usr/bin/env node
import { main } from '../index.js';

function isMainModule(): boolean {
  try {
    // Direct execution, npx and the installed bin all end up here
    const mainFile = process.argv[1];
    return Boolean(
      mainFile &&
        (mainFile.endsWith('cli.js') ||
          mainFile.endsWith('cli.ts') ||
          mainFile.includes('responses-bridge')),
    );
  } catch {
    return false;
  }
}

if (isMainModule()) {
  main().catch((error: unknown) => {
    console.error('Unhandled error:', error);
    process.exit(1);
  });
}
