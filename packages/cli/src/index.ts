#!/usr/bin/env node
import { defaultContext } from './context.js';
import { createProgram } from './program.js';

await createProgram(defaultContext()).parseAsync();
