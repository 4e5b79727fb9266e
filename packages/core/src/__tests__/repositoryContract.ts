/**
 * Behaviour shared by every AuthRepository implementation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { AuthRepository } from '../repository.js';
import { isAuthError } from '../errors.js';

export interface RepositoryHarness {
  repository: AuthRepository;
  close?: () => void;
}

/** Each call returns a fresh, empty repository whose clock ticks by 1ms per write */
export type RepositoryFactory = (now: () => number) => RepositoryHarness;

async function expectKind(promise: Promise<unknown>, kind: string): Promise<void> {
  const err: unknown = await promise.then(() => null, (e: unknown) => e);
  expect(isAuthError(err)).toBe(true);
  if (isAuthError(err)) {
    expect(err.kind).toBe(kind);
  }
}

export function describeRepositoryContract(name: string, factory: RepositoryFactory): void {
  describe(`${name} (AuthRepository contract)`, () => {
    let harness: RepositoryHarness;
    let repo: AuthRepository;

    beforeEach(() => {
      let clock = 1_000;
      harness = factory(() => ++clock);
      repo = harness.repository;
    });

    afterEach(() => {
      harness.close?.();
    });

    describe('permissions', () => {
      it('should report NONE for unknown users', async () => {
        expect(await repo.getRole(42)).toBe('NONE');
      });

      it('should return the prior role from setRole', async () => {
        expect(await repo.setRole(42, 'GROUP_ADMIN', 1)).toBe('NONE');
        expect(await repo.setRole(42, 'SUPER_ADMIN', 1)).toBe('GROUP_ADMIN');
        expect(await repo.getRole(42)).toBe('SUPER_ADMIN');
      });

      it('should treat setting the current role as a no-op', async () => {
        await repo.setRole(42, 'GROUP_ADMIN', 1);
        expect(await repo.setRole(42, 'GROUP_ADMIN', 7)).toBe('GROUP_ADMIN');

        const [permission] = await repo.listPermissions();
        expect(permission?.grantedBy).toBe(1);
      });

      it('should hide NONE rows from listPermissions', async () => {
        await repo.setRole(10, 'GROUP_ADMIN', 1);
        await repo.setRole(11, 'GROUP_ADMIN', 1);
        await repo.setRole(10, 'NONE', 1);

        const permissions = await repo.listPermissions();
        expect(permissions.map(p => p.userId)).toEqual([11]);
        expect(await repo.getRole(10)).toBe('NONE');
      });

      it('should filter and order permissions by grant time', async () => {
        await repo.setRole(30, 'SUPER_ADMIN', null);
        await repo.setRole(20, 'GROUP_ADMIN', 30);
        await repo.setRole(10, 'GROUP_ADMIN', 30);

        expect((await repo.listPermissions()).map(p => p.userId)).toEqual([30, 20, 10]);
        expect((await repo.listPermissions('GROUP_ADMIN')).map(p => p.userId)).toEqual([20, 10]);

        const [root] = await repo.listPermissions('SUPER_ADMIN');
        expect(root).toMatchObject({ userId: 30, role: 'SUPER_ADMIN', grantedBy: null });
      });

      it('should refuse to demote the last super admin', async () => {
        await repo.setRole(1, 'SUPER_ADMIN', null);

        await expectKind(repo.setRole(1, 'GROUP_ADMIN', 1), 'BadRequest');
        await expectKind(repo.setRole(1, 'NONE', 1), 'BadRequest');
        expect(await repo.getRole(1)).toBe('SUPER_ADMIN');
      });

      it('should allow demoting a super admin when another remains', async () => {
        await repo.setRole(1, 'SUPER_ADMIN', null);
        await repo.setRole(2, 'SUPER_ADMIN', 1);

        expect(await repo.setRole(1, 'NONE', 2)).toBe('SUPER_ADMIN');
        expect(await repo.getRole(1)).toBe('NONE');
        await expectKind(repo.setRole(2, 'NONE', 2), 'BadRequest');
      });
    });

    describe('whitelist', () => {
      it('should create entries with audit fields', async () => {
        const entry = await repo.addWhitelist(100, 'GROUP', -500, 1);

        expect(entry).toMatchObject({
          userId: 100,
          scopeType: 'GROUP',
          chatId: -500,
          createdBy: 1,
        });
        expect(typeof entry.id).toBe('number');
        expect(entry.createdAt).toBeGreaterThan(1_000);
      });

      it('should default createdBy to null', async () => {
        const entry = await repo.addWhitelist(100, 'GLOBAL');
        expect(entry.createdBy).toBeNull();
        expect(entry.chatId).toBeNull();
      });

      it('should reject duplicate tuples with AlreadyExists', async () => {
        await repo.addWhitelist(100, 'GLOBAL', null, 1);
        await expectKind(repo.addWhitelist(100, 'GLOBAL', null, 2), 'AlreadyExists');

        await repo.addWhitelist(100, 'GROUP', -500, 1);
        await expectKind(repo.addWhitelist(100, 'GROUP', -500, 1), 'AlreadyExists');
      });

      it('should keep GROUP entries for different chats apart', async () => {
        await repo.addWhitelist(100, 'GROUP', -500);
        await repo.addWhitelist(100, 'GROUP', -600);

        expect(await repo.isWhitelisted(100, 'GROUP', -500)).toBe(true);
        expect(await repo.isWhitelisted(100, 'GROUP', -600)).toBe(true);
        expect(await repo.isWhitelisted(100, 'GROUP', -700)).toBe(false);
        expect(await repo.isWhitelisted(100, 'GLOBAL')).toBe(false);
      });

      it('should validate the scope and chat combination', async () => {
        await expectKind(repo.addWhitelist(100, 'GROUP'), 'BadRequest');
        await expectKind(repo.addWhitelist(100, 'GLOBAL', -500), 'BadRequest');
        await expectKind(repo.removeWhitelist(100, 'GROUP', null), 'BadRequest');
      });

      it('should remove entries and report NotFound for absent ones', async () => {
        await repo.addWhitelist(100, 'GLOBAL');
        await repo.removeWhitelist(100, 'GLOBAL');

        expect(await repo.isWhitelisted(100, 'GLOBAL')).toBe(false);
        await expectKind(repo.removeWhitelist(100, 'GLOBAL'), 'NotFound');
        await expectKind(repo.removeWhitelist(100, 'GROUP', -500), 'NotFound');
      });

      it('should allow re-adding a removed entry', async () => {
        await repo.addWhitelist(100, 'GROUP', -500);
        await repo.removeWhitelist(100, 'GROUP', -500);
        const again = await repo.addWhitelist(100, 'GROUP', -500);
        expect(again.chatId).toBe(-500);
      });

      it('should list entries by filter in creation order', async () => {
        await repo.addWhitelist(3, 'GLOBAL');
        await repo.addWhitelist(1, 'GROUP', -500);
        await repo.addWhitelist(2, 'GROUP', -600);
        await repo.addWhitelist(4, 'GROUP', -500);

        expect((await repo.listWhitelist()).map(e => e.userId)).toEqual([3, 1, 2, 4]);
        expect((await repo.listWhitelist('GLOBAL')).map(e => e.userId)).toEqual([3]);
        expect((await repo.listWhitelist('GROUP', -500)).map(e => e.userId)).toEqual([1, 4]);
        expect(await repo.listWhitelist('GROUP', -999)).toEqual([]);
      });
    });

    describe('concurrent writes', () => {
      it('should accept exactly one of two racing whitelist inserts', async () => {
        const results = await Promise.allSettled([
          repo.addWhitelist(100, 'GROUP', -500, 1),
          repo.addWhitelist(100, 'GROUP', -500, 2),
        ]);

        const fulfilled = results.filter(r => r.status === 'fulfilled');
        const rejected = results.flatMap((r): unknown[] => (r.status === 'rejected' ? [r.reason] : []));
        expect(fulfilled).toHaveLength(1);
        expect(rejected).toHaveLength(1);
        expect(isAuthError(rejected[0], 'AlreadyExists')).toBe(true);
        expect(await repo.listWhitelist('GROUP', -500)).toHaveLength(1);
      });

      it('should keep one permission row with the last role written', async () => {
        const priors = await Promise.all([
          repo.setRole(42, 'GROUP_ADMIN', 1),
          repo.setRole(42, 'SUPER_ADMIN', 2),
        ]);

        expect(priors).toEqual(['NONE', 'GROUP_ADMIN']);
        expect(await repo.getRole(42)).toBe('SUPER_ADMIN');
        const permissions = await repo.listPermissions();
        expect(permissions.filter(p => p.userId === 42)).toHaveLength(1);
        expect(permissions[0]).toMatchObject({ userId: 42, role: 'SUPER_ADMIN', grantedBy: 2 });
      });

      it('should store one row for racing group authorizations', async () => {
        await Promise.all([repo.authorizeGroup(-500, 1), repo.authorizeGroup(-500, 2)]);

        expect(await repo.listAuthorizedGroups()).toEqual([-500]);
      });
    });

    describe('authorized groups', () => {
      it('should authorize, check and revoke groups', async () => {
        expect(await repo.isGroupAuthorized(-500)).toBe(false);

        await repo.authorizeGroup(-500, 1);
        expect(await repo.isGroupAuthorized(-500)).toBe(true);

        await repo.revokeGroup(-500);
        expect(await repo.isGroupAuthorized(-500)).toBe(false);
      });

      it('should treat re-authorization as a no-op', async () => {
        await repo.authorizeGroup(-500, 1);
        await repo.authorizeGroup(-600, 1);
        await repo.authorizeGroup(-500, 2);

        expect(await repo.listAuthorizedGroups()).toEqual([-500, -600]);
      });

      it('should report NotFound when revoking an unknown group', async () => {
        await expectKind(repo.revokeGroup(-500), 'NotFound');
      });

      it('should return an empty list when no group is authorized', async () => {
        expect(await repo.listAuthorizedGroups()).toEqual([]);
      });
    });
  });
}
