#!/usr/bin/env node
import { runCli } from './index';

process.exit(runCli(process.argv.slice(2)));
