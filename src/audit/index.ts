export { AuditSession } from './audit-session.js';
export type { AuditSessionOptions } from './audit-session.js';
