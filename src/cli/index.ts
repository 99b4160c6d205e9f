#!/usr/bin/env tsx

/**
 * CLI entry point for siril-multi-night
 * Handles command-line argument parsing and user interaction
 */

import { createProgram } from "./program";

await createProgram().parseAsync();
