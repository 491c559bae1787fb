import type { CategoryHandler } from '../../types.js';

export interface UserRecord {
  name: string;
  uid: number;
  gid: number;
  /** Comment field, usually the full name */
  gecos: string;
  home: string;
  shell: string;
}

/**
 * Runs `getent passwd`, which covers local files and any NSS backends
 * (LDAP, sssd) configured on the host.
 */
export const users: CategoryHandler<UserRecord> = {
  command: 'getent',
  args: ['passwd'],
  parse: parsePasswd,
};

export function parsePasswd(stdout: string): UserRecord[] {
  const records: UserRecord[] = [];

  for (const line of stdout.split('\n')) {
    const fields = line.split(':');
    if (fields.length !== 7) continue;

    const [name, , uidStr, gidStr, gecos, home, shell] = fields;
    if (!name || !uidStr || !gidStr) continue;

    const uid = Number(uidStr);
    const gid = Number(gidStr);
    if (!Number.isInteger(uid) || !Number.isInteger(gid)) continue;

    records.push({
      name,
      uid,
      gid,
      gecos: gecos ?? '',
      home: home ?? '',
      shell: shell ?? '',
    });
  }

  return records;
}
