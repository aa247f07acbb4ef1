#!/usr/bin/env node
import { createProgram } from './program.js';
import { installSignalHandlers } from './utils/signals.js';

installSignalHandlers();

await createProgram().parseAsync(process.argv);
