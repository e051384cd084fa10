#!/usr/bin/env node
import * as fs from 'fs';
import { createProgram, defaultDependencies } from './program.js';

const program = createProgram({
    ...defaultDependencies,
    // git reports the real path of the work tree, so compare against the real cwd
    cwd: () => fs.realpathSync(process.cwd())
});

program.parse();
