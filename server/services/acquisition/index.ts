/**
 * 采集模块
 */

export { AcquisitionService } from './acquisition.service';
export { BatchBuilder } from './batch-builder';
export { DataPoster } from './data-poster';
export { USAGE, parseAcquisitionArgs } from './cli-args';

export type { AcquisitionOptions, AcquisitionSummary } from './acquisition.service';
export type { DataPosterOptions, PostResult } from './data-poster';
export type { AcquisitionCliOptions, ParsedCli } from './cli-args';
