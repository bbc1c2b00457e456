#!/usr/bin/env node
import { main } from '@/talknotes';

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
        process.exitCode = 1;
    });
