#!/usr/bin/env node
/**
 * eml-extract: command line front end for the extraction pipeline
 *
 * @packageDocumentation
 */

import { createProgram } from './program.js';

createProgram().parse(process.argv);
