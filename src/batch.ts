#!/usr/bin/env node
import { runBatch } from './runner';

runBatch(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
