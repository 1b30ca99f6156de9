#!/usr/bin/env node
import { program } from './cli/index.js';

await program.parseAsync(process.argv);
