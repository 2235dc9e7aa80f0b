#!/usr/bin/env node
/**
 * Bulk tailoring with the keyword and action-verb focused prompt.
 * Writes to its own output file so both tailoring runs can be compared.
 */

import { startCli } from './runTailorCli';

if (require.main === module) {
  startCli('tailor-refined');
}
