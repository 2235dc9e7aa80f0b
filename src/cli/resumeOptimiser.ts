#!/usr/bin/env node
/**
 * Single-page ATS optimisation of the resume for every job in the input CSV.
 */

import { startCli } from './runTailorCli';

if (require.main === module) {
  startCli('optimiser');
}
