import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Config } from '../config';
import {
  AccessCategory,
  DEFAULT_GROUP_ASSOCIATIONS,
  DEFAULT_SECURITY_GROUP,
  SECURITY_GROUP_PRIORITY,
  SecurityGroup,
} from '../constants/security-group.constants';

export type UsersByRole = Partial<Record<AccessCategory, readonly string[]>>;

/**
 * Maps SharePoint site groups to the coarse security group label stored on every chunk.
 * Configured associations are merged over the built-in ones.
 */
@Injectable()
export class SecurityGroupService {
  private readonly logger = new Logger(this.constructor.name);
  private readonly groupAssociations: Map<string, SecurityGroup>;

  public constructor(private readonly configService: ConfigService<Config, true>) {
    const configured = this.configService.get('processing.securityGroups', { infer: true });
    this.groupAssociations = new Map(
      Object.entries({ ...DEFAULT_GROUP_ASSOCIATIONS, ...configured }),
    );
  }

  public setGroupAssociation(customerGroup: string, securityGroup: SecurityGroup): void {
    this.groupAssociations.set(customerGroup, securityGroup);
    this.logger.log({ msg: 'Associated customer group with security group', customerGroup, securityGroup });
  }

  public getHighestPriorityGroup(usersByRole: UsersByRole): SecurityGroup {
    const found = new Set<SecurityGroup>();

    for (const category of [AccessCategory.Owner, AccessCategory.Read]) {
      for (const entity of usersByRole[category] ?? []) {
        const securityGroup = this.groupAssociations.get(entity);
        if (securityGroup) found.add(securityGroup);
      }
    }

    const highest = SECURITY_GROUP_PRIORITY.find((group) => found.has(group));
    if (highest) return highest;

    this.logger.debug({
      msg: 'No mapped security group found, using default',
      defaultGroup: DEFAULT_SECURITY_GROUP,
    });
    return DEFAULT_SECURITY_GROUP;
  }

  public resolveAccessLabel(readAccessEntities: readonly string[]): SecurityGroup {
    return this.getHighestPriorityGroup({ [AccessCategory.Read]: readAccessEntities });
  }
}
