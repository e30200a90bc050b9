#!/usr/bin/env node
import { program } from './cli/index.js';
import { fail } from './cli/ui.js';

program.parseAsync(process.argv).catch(fail);
