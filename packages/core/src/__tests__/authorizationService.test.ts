import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { AccessRequest, Action, ChatType } from '@warden/protocol';
import { ACTION_SPECS } from '@warden/protocol';
import { AuthorizationService } from '../authorizationService.js';
import { InMemoryAuthRepository } from '../memoryRepository.js';
import { AuthError } from '../errors.js';
import { setLogLevel } from '../logger.js';

const ROOT = 1;
const GROUP_ADMIN = 2;
const USER = 100;
const OTHER = 101;
const PRIVATE_CHAT = 100;
const GROUP = -500;
const OTHER_GROUP = -600;

const ALL_ACTIONS = Object.keys(ACTION_SPECS).filter((key): key is Action => key in ACTION_SPECS);

function request(userId: number, chatType: ChatType, action: Action, extra: Partial<AccessRequest> = {}): AccessRequest {
  return {
    userId,
    chatId: chatType === 'private' ? userId : GROUP,
    chatType,
    action,
    ...extra,
  };
}

describe('AuthorizationService', () => {
  let repo: InMemoryAuthRepository;
  let service: AuthorizationService;

  beforeEach(async () => {
    setLogLevel('error');
    repo = new InMemoryAuthRepository();
    service = new AuthorizationService(repo);
    await repo.setRole(ROOT, 'SUPER_ADMIN', null);
  });

  describe('super admins', () => {
    it('should be allowed every action in every chat, authorized or not', async () => {
      for (const action of ALL_ACTIONS) {
        for (const chatType of ['private', 'group'] as const) {
          const verdict = await service.decide(request(ROOT, chatType, action));
          expect(verdict).toMatchObject({ allowed: true, reason: 'super_admin', layer: 'role' });
        }
      }
    });
  });

  describe('super-admin commands', () => {
    it('should deny everyone else with InsufficientRole', async () => {
      await repo.setRole(GROUP_ADMIN, 'GROUP_ADMIN', ROOT);
      await repo.addWhitelist(USER, 'GLOBAL');
      await repo.authorizeGroup(GROUP, ROOT);

      for (const userId of [GROUP_ADMIN, USER, OTHER]) {
        for (const action of ['permission_set', 'group_authorize', 'group_revoke', 'group_list'] as const) {
          for (const chatType of ['private', 'group'] as const) {
            const verdict = await service.decide(request(userId, chatType, action));
            expect(verdict).toMatchObject({ allowed: false, reason: 'InsufficientRole', layer: 'command' });
          }
        }
      }
    });

    it('should never answer WrongChatType, whatever the role or chat', async () => {
      await repo.setRole(GROUP_ADMIN, 'GROUP_ADMIN', ROOT);
      await repo.authorizeGroup(GROUP, ROOT);

      for (const userId of [ROOT, GROUP_ADMIN, USER]) {
        for (const action of ALL_ACTIONS) {
          for (const chatType of ['private', 'group'] as const) {
            const verdict = await service.decide(request(userId, chatType, action));
            expect(verdict.reason).not.toBe('WrongChatType');
          }
        }
      }
    });

    it('should deny a GROUP_ADMIN trying to authorize a group', async () => {
      await repo.setRole(GROUP_ADMIN, 'GROUP_ADMIN', ROOT);

      const verdict = await service.decide(request(GROUP_ADMIN, 'private', 'group_authorize', { targetGroupId: GROUP }));
      expect(verdict.allowed).toBe(false);
      expect(verdict.reason).toBe('InsufficientRole');
      expect(await repo.isGroupAuthorized(GROUP)).toBe(false);
    });
  });

  describe('group-admin commands', () => {
    beforeEach(async () => {
      await repo.setRole(GROUP_ADMIN, 'GROUP_ADMIN', ROOT);
    });

    it('should allow a GROUP_ADMIN inside a group', async () => {
      const verdict = await service.decide(request(GROUP_ADMIN, 'group', 'whitelist_add'));
      expect(verdict).toMatchObject({ allowed: true, reason: 'group_admin', layer: 'group_admin' });
    });

    it('should allow a GROUP_ADMIN in private only with a target group', async () => {
      const withTarget = await service.decide(request(GROUP_ADMIN, 'private', 'whitelist_remove', { targetGroupId: GROUP }));
      expect(withTarget).toMatchObject({ allowed: true, reason: 'group_admin' });

      const withoutTarget = await service.decide(request(GROUP_ADMIN, 'private', 'whitelist_remove'));
      expect(withoutTarget).toMatchObject({ allowed: false, reason: 'InsufficientRole', layer: 'group_admin' });
    });

    it('should deny whitelisted users without the role', async () => {
      await repo.addWhitelist(USER, 'GLOBAL');
      await repo.authorizeGroup(GROUP, ROOT);

      const verdict = await service.decide(request(USER, 'group', 'whitelist_list'));
      expect(verdict).toMatchObject({ allowed: false, reason: 'InsufficientRole' });
    });
  });

  describe('ordinary access', () => {
    it('should deny unknown users in private chat', async () => {
      const verdict = await service.decide(request(USER, 'private', 'chat'));
      expect(verdict).toMatchObject({ allowed: false, reason: 'NotWhitelisted', layer: 'access' });
    });

    it('should allow users holding any role without a whitelist entry', async () => {
      await repo.setRole(GROUP_ADMIN, 'GROUP_ADMIN', ROOT);

      const verdict = await service.decide(request(GROUP_ADMIN, 'private', 'chat'));
      expect(verdict).toMatchObject({ allowed: true, reason: 'role' });
    });

    it('should deny every non-super-admin in an unauthorized group', async () => {
      await repo.setRole(GROUP_ADMIN, 'GROUP_ADMIN', ROOT);
      await repo.addWhitelist(USER, 'GLOBAL');
      await repo.addWhitelist(OTHER, 'GROUP', GROUP);

      for (const userId of [GROUP_ADMIN, USER, OTHER]) {
        const verdict = await service.decide(request(userId, 'group', 'chat'));
        expect(verdict).toMatchObject({ allowed: false, reason: 'GroupNotAuthorized', layer: 'access' });
      }
    });

    it('should honour GLOBAL entries in authorized groups', async () => {
      await repo.authorizeGroup(GROUP, ROOT);
      await repo.addWhitelist(USER, 'GLOBAL');

      const verdict = await service.decide(request(USER, 'group', 'chat'));
      expect(verdict).toMatchObject({ allowed: true, reason: 'whitelist_global' });
    });

    it('should confine GROUP entries to their own chat', async () => {
      await repo.authorizeGroup(GROUP, ROOT);
      await repo.authorizeGroup(OTHER_GROUP, ROOT);
      await repo.addWhitelist(USER, 'GROUP', GROUP);

      const inGroup = await service.decide(request(USER, 'group', 'chat'));
      expect(inGroup).toMatchObject({ allowed: true, reason: 'whitelist_group' });

      const elsewhere = await service.decide(request(USER, 'group', 'chat', { chatId: OTHER_GROUP }));
      expect(elsewhere).toMatchObject({ allowed: false, reason: 'NotWhitelisted' });

      const inPrivate = await service.decide(request(USER, 'private', 'chat', { chatId: PRIVATE_CHAT }));
      expect(inPrivate).toMatchObject({ allowed: false, reason: 'NotWhitelisted' });
    });

    it('should apply the same rules to help', async () => {
      const denied = await service.decide(request(USER, 'private', 'help'));
      expect(denied).toMatchObject({ allowed: false, reason: 'NotWhitelisted' });

      await repo.addWhitelist(USER, 'GLOBAL');
      const allowed = await service.decide(request(USER, 'private', 'help'));
      expect(allowed).toMatchObject({ allowed: true, reason: 'whitelist_global' });
    });

    it('should follow a user from private to global to group access', async () => {
      // Unknown user writes privately
      expect((await service.decide(request(USER, 'private', 'chat'))).allowed).toBe(false);

      // Granted global access
      await repo.addWhitelist(USER, 'GLOBAL', null, ROOT);
      expect((await service.decide(request(USER, 'private', 'chat'))).allowed).toBe(true);

      // Group still closed
      expect((await service.decide(request(USER, 'group', 'chat'))).reason).toBe('GroupNotAuthorized');

      // Group opened
      await repo.authorizeGroup(GROUP, ROOT);
      expect((await service.decide(request(USER, 'group', 'chat'))).reason).toBe('whitelist_global');

      // Global access withdrawn, group-scoped access remains effective only here
      await repo.removeWhitelist(USER, 'GLOBAL');
      await repo.addWhitelist(USER, 'GROUP', GROUP, ROOT);
      expect((await service.decide(request(USER, 'group', 'chat'))).reason).toBe('whitelist_group');
      expect((await service.decide(request(USER, 'private', 'chat'))).reason).toBe('NotWhitelisted');
    });
  });

  describe('verdicts', () => {
    it('should echo the request context', async () => {
      const verdict = await service.decide(request(USER, 'private', 'chat'));
      expect(verdict).toEqual({
        allowed: false,
        reason: 'NotWhitelisted',
        layer: 'access',
        userId: USER,
        chatId: USER,
        chatType: 'private',
        action: 'chat',
      });
    });

    it('should reflect repository changes immediately', async () => {
      await repo.setRole(USER, 'GROUP_ADMIN', ROOT);
      expect((await service.decide(request(USER, 'private', 'chat'))).allowed).toBe(true);

      await repo.setRole(USER, 'NONE', ROOT);
      expect((await service.decide(request(USER, 'private', 'chat'))).allowed).toBe(false);
    });

    it('should log grants at info and denials at warn', async () => {
      setLogLevel('info');
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      await service.decide(request(ROOT, 'private', 'chat'));
      await service.decide(request(USER, 'private', 'chat'));

      expect(log).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toMatchObject({
        level: 'info',
        component: 'authorization',
        event: 'access_granted',
        reason: 'super_admin',
      });
      expect(warn).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(warn.mock.calls[0]?.[0]))).toMatchObject({
        level: 'warn',
        event: 'access_denied',
        reason: 'NotWhitelisted',
        userId: USER,
      });

      log.mockRestore();
      warn.mockRestore();
    });

    it('should propagate repository failures instead of deciding', async () => {
      vi.spyOn(repo, 'getRole').mockRejectedValueOnce(new AuthError('StorageUnavailable', 'disk gone'));

      await expect(service.decide(request(USER, 'private', 'chat'))).rejects.toMatchObject({
        kind: 'StorageUnavailable',
      });
    });
  });
});
