import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SecurityGroupService } from './security-group.service';

@Module({
  imports: [ConfigModule],
  providers: [SecurityGroupService],
  exports: [SecurityGroupService],
})
export class AccessControlModule {}
