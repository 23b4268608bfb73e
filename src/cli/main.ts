/**
 * seqplot 진입점
 */

import { processIO } from './io';
import { runSeqplot } from './seqplot';

process.exitCode = await runSeqplot(process.argv.slice(2), processIO());
