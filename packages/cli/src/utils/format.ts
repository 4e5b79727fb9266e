import type { Permission, WhitelistEntry } from '@warden/protocol';
import type { BootstrapResult } from '@warden/core';

function formatTime(ms: number): string {
  return new Date(ms).toISOString();
}

export function formatPermission(permission: Permission): string {
  const grantor = permission.grantedBy === null ? 'bootstrap' : `user ${permission.grantedBy}`;
  return `${permission.userId}  ${permission.role}  granted by ${grantor} at ${formatTime(permission.grantedAt)}`;
}

export function formatWhitelistEntry(entry: WhitelistEntry): string {
  const scope = entry.scopeType === 'GLOBAL' ? 'global' : `group ${entry.chatId}`;
  const creator = entry.createdBy === null ? '' : ` by user ${entry.createdBy}`;
  return `${entry.userId}  ${scope}  added${creator} at ${formatTime(entry.createdAt)}`;
}

export function formatBootstrap(result: BootstrapResult): string[] {
  const lines: string[] = [];
  if (result.created.length > 0) lines.push(`Promoted: ${result.created.join(', ')}`);
  if (result.upgraded.length > 0) lines.push(`Upgraded from GROUP_ADMIN: ${result.upgraded.join(', ')}`);
  if (result.unchanged.length > 0) lines.push(`Already super admin: ${result.unchanged.join(', ')}`);
  return lines;
}
