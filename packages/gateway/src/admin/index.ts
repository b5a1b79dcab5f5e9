/**
 * Admin Module
 */

export type { AccessControl, AdminContext } from './access-control.js';
export { OwnerAccessControl } from './access-control.js';
export { AdminSurface } from './admin-surface.js';
