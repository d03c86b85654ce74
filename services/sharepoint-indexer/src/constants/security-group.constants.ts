export const SecurityGroup = {
  Critical: 'Group_critical',
  Medium: 'Group_medium',
  Low: 'Group_low',
} as const;
export type SecurityGroup = (typeof SecurityGroup)[keyof typeof SecurityGroup];

// Highest priority first
export const SECURITY_GROUP_PRIORITY: readonly SecurityGroup[] = [
  SecurityGroup.Critical,
  SecurityGroup.Medium,
  SecurityGroup.Low,
];

export const DEFAULT_SECURITY_GROUP: SecurityGroup = SecurityGroup.Medium;

export const DEFAULT_GROUP_ASSOCIATIONS: Readonly<Record<string, SecurityGroup>> = {
  'Contoso Owners': SecurityGroup.Critical,
  'Contoso Visitors': SecurityGroup.Medium,
  'Contoso Members': SecurityGroup.Low,
};

export const AccessCategory = {
  Owner: 'owner',
  Read: 'read',
} as const;
export type AccessCategory = (typeof AccessCategory)[keyof typeof AccessCategory];
