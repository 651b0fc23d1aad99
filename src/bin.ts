#!/usr/bin/env node
import { run } from './cli';
import { errorMessage } from './utils/errorUtils';

run(process.argv.slice(2)).then(
    code => { process.exitCode = code; },
    (error: unknown) => {
        console.error(errorMessage(error));
        process.exitCode = 1;
    }
);
