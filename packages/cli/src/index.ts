#!/usr/bin/env node
import { createRequire } from 'node:module';
import { createProgram } from './program.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

await createProgram(pkg.version).parseAsync();
