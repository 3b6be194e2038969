#!/usr/bin/env node

/**
 * schemaforge CLI
 *
 * Usage:
 *   schemaforge compile [entry]          Validate and generate output files
 *   schemaforge check [entry]            Report diagnostics only
 *   schemaforge ir [entry]               Print the IR as JSON
 *   schemaforge load <entry> <table>     Print a table's loaded data rows as JSON
 */

import { createProgram } from './program.js';

createProgram().parse();
