/**
 * seqplot-multi 진입점
 */

import { processIO } from './io';
import { runSeqplotMulti } from './seqplotMulti';

process.exitCode = await runSeqplotMulti(process.argv.slice(2), processIO());
