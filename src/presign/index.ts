export type { PresignService } from './interface.js';
export { PresignServiceImpl, extractToken } from './service.js';
