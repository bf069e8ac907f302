#!/usr/bin/env node
import { runCli } from './select';

runCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('[TM] FATAL ERROR:', error);
    process.exit(1);
  });
