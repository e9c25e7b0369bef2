/**
 * Vitest global setup
 *
 * Output assertions compare plain text, so colours are switched off.
 */

import chalk from "chalk";

chalk.level = 0;
