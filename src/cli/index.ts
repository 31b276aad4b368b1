#!/usr/bin/env node
/**
 * typefmt CLI entry point
 *
 * Commands:
 * - format - Render a template with command line arguments
 * - check  - Check a template against argument kinds
 */

import { createProgram } from "./program.js";

await createProgram().parseAsync(process.argv);
