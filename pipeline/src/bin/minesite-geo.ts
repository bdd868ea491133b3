#!/usr/bin/env node
import { main } from '../handlers/cli.js';

process.exitCode = await main(process.argv.slice(2));
