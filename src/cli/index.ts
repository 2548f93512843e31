#!/usr/bin/env node
/**
 * stepview CLI entrypoint
 */

import { createProgram } from './program.js';

createProgram().parse(process.argv);
