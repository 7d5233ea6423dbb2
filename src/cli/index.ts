#!/usr/bin/env node
// Task Planner CLI

import { createProgram } from './program.js';
import { handleError } from './utils/error-handler.js';

createProgram().parseAsync(process.argv).catch(handleError);
