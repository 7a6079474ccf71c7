#!/usr/bin/env node
import dotenv from 'dotenv';
import { run, EXIT_FAILURE } from './cli/run.js';
import { formatUserError } from './utils/errors.js';

dotenv.config({ override: false });

run(process.argv.slice(2))
  .then((code) => { process.exitCode = code; })
  .catch((e: unknown) => {
    console.error(formatUserError('poker-standings', e, true));
    process.exitCode = EXIT_FAILURE;
  });
