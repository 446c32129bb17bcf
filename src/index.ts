#!/usr/bin/env node
import 'dotenv/config';
import { run } from './cli.js';

process.exit(run(process.argv.slice(2)));
