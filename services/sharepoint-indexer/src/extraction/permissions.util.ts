function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readPath(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function userIdsOf(identities: unknown): string[] {
  return asArray(identities)
    .map((identity) => readPath(identity, 'user', 'id'))
    .filter((id): id is string => typeof id === 'string' && id.length > 0);
}

/**
 * Reduces drive item permissions to the user ids and site group names that can read the item.
 * Graph responses are read defensively since sharing links and inherited grants differ in shape.
 *
 * @example
 * getReadAccessEntities([
 *   { roles: ['read'], grantedToV2: { siteGroup: { displayName: 'Contoso Visitors' } } },
 *   { roles: ['write'], grantedToIdentitiesV2: [{ user: { id: 'u-1' } }] },
 * ]); // ["Contoso Visitors"]
 */
export function getReadAccessEntities(permissions: readonly unknown[]): string[] {
  const entities = new Set<string>();

  for (const permission of permissions) {
    if (!isRecord(permission) || !('roles' in permission)) continue;
    if (!asArray(permission.roles).includes('read')) continue;

    for (const id of userIdsOf(permission.grantedToIdentitiesV2)) entities.add(id);
    for (const id of userIdsOf(permission.grantedToIdentities)) entities.add(id);

    const groupName = readPath(permission, 'grantedToV2', 'siteGroup', 'displayName');
    if (typeof groupName === 'string' && groupName.length > 0) entities.add(groupName);
  }

  return [...entities];
}
