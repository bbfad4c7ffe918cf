#!/usr/bin/env node
import { run } from '../cli/diff-jobs.js';

process.exitCode = await run(process.argv.slice(2));
