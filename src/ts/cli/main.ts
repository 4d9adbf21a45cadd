#!/usr/bin/env node
import { describeError } from '../errors.js';
import { createProgram } from './program.js';

createProgram()
    .parseAsync(process.argv)
    .catch((e: unknown) => {
        console.error(`Error: ${describeError(e)}`);
        process.exitCode = 1;
    });
