import type { Role } from './store.js';

export type Permission = 'create_note' | 'delete_note' | 'manage_users';

const grants: Record<Role, readonly Permission[]> = {
  admin: ['create_note', 'delete_note', 'manage_users'],
  user: ['create_note']
};

export function hasPermission(role: Role, permission: Permission) {
  return grants[role].includes(permission);
}
