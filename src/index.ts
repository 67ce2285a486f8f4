#!/usr/bin/env node
/**
 * dnssync - Entry Point
 *
 * Copies Designate managed DNS zones from one OpenStack cloud to another
 */
import { main } from './cli/program.js';

main(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
