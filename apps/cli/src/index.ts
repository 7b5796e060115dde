/**
 * Starfleet CLI
 *
 * Main entry point for the starfleet command.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
