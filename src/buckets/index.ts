export type { BucketsService } from './interface.js';
export { BucketsServiceImpl } from './service.js';
