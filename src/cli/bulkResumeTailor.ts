#!/usr/bin/env node
/**
 * Hyper-tailors the resume for every job in the input CSV, keeping its section headers.
 */

import { startCli } from './runTailorCli';

if (require.main === module) {
  startCli('tailor');
}
