#!/usr/bin/env node
import { run } from '../cli/search-logs.js';

process.exitCode = await run(process.argv.slice(2));
