import type { CallerIdentity } from '../types/handler.js';
import type { TaskOwner } from '../types/plugin.js';

export const ANONYMOUS_CALLER: CallerIdentity = Object.freeze({
  tenant: 'public',
  subject: 'anonymous',
});

export const TENANT_ADMIN_ROLE = 'tenant-admin';

/**
 * Decides who owns a new task and who may see an existing one. Every read and
 * write goes through `canAccess`; a denied task is reported as missing.
 */
export interface ScopePolicy {
  ownerFor(caller: CallerIdentity): TaskOwner;
  canAccess(caller: CallerIdentity, owner: TaskOwner): boolean;
}

/**
 * Attribute scope: a task is visible to its creator, and to holders of the
 * tenant-admin role within the same tenant. Tenants never see each other.
 */
export class TenantScopePolicy implements ScopePolicy {
  private readonly adminRole: string;

  constructor(adminRole: string = TENANT_ADMIN_ROLE) {
    this.adminRole = adminRole;
  }

  ownerFor(caller: CallerIdentity): TaskOwner {
    return { tenant: caller.tenant, subject: caller.subject };
  }

  canAccess(caller: CallerIdentity, owner: TaskOwner): boolean {
    if (caller.tenant !== owner.tenant) return false;
    if (caller.subject === owner.subject) return true;
    return caller.roles?.includes(this.adminRole) ?? false;
  }
}
