#!/usr/bin/env node
/**
 * @swarmplan/cli — Command Line Interface
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
