export type { ObjectsService } from './interface.js';
export { ObjectsServiceImpl } from './service.js';
export { buildFileHeaders, toBytes } from './utils.js';
