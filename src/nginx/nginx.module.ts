import { Module } from '@nestjs/common';
import { NginxService } from './nginx.service';
import { NginxController } from './nginx.controller';
import { InstallerTokenGuard } from './guards/installer-token.guard';

@Module({
  controllers: [NginxController],
  providers: [NginxService, InstallerTokenGuard],
  exports: [NginxService],
})
export class NginxModule {}
