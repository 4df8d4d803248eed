#!/usr/bin/env node
/**
 * @fileoverview Command line entry point. Takes no arguments.
 */

import { main } from './main.js';

main().then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error('Error:', error);
        process.exitCode = 1;
    }
);
