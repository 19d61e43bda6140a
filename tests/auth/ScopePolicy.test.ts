import { describe, it, expect } from 'vitest';
import { ANONYMOUS_CALLER, TenantScopePolicy } from '../../src/auth/ScopePolicy.js';

describe('TenantScopePolicy', () => {
  const policy = new TenantScopePolicy();
  const owner = policy.ownerFor({ tenant: 'acme', subject: 'alice', roles: ['tenant-admin'] });

  it('records tenant and subject only', () => {
    expect(owner).toEqual({ tenant: 'acme', subject: 'alice' });
  });

  it('lets the creator see the task', () => {
    expect(policy.canAccess({ tenant: 'acme', subject: 'alice' }, owner)).toBe(true);
  });

  it('hides the task from other subjects of the tenant', () => {
    expect(policy.canAccess({ tenant: 'acme', subject: 'bob' }, owner)).toBe(false);
  });

  it('shows the task to a tenant admin', () => {
    expect(policy.canAccess({ tenant: 'acme', subject: 'bob', roles: ['tenant-admin'] }, owner)).toBe(true);
  });

  it('never crosses tenants, even for admins', () => {
    expect(policy.canAccess({ tenant: 'globex', subject: 'alice', roles: ['tenant-admin'] }, owner)).toBe(false);
  });

  it('accepts a custom admin role', () => {
    const custom = new TenantScopePolicy('ops');
    expect(custom.canAccess({ tenant: 'acme', subject: 'bob', roles: ['ops'] }, owner)).toBe(true);
    expect(custom.canAccess({ tenant: 'acme', subject: 'bob', roles: ['tenant-admin'] }, owner)).toBe(false);
  });

  it('treats anonymous callers as one public subject', () => {
    const anonymousOwner = policy.ownerFor(ANONYMOUS_CALLER);
    expect(anonymousOwner).toEqual({ tenant: 'public', subject: 'anonymous' });
    expect(policy.canAccess(ANONYMOUS_CALLER, anonymousOwner)).toBe(true);
  });
});
