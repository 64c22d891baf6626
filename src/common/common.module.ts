import { Module } from '@nestjs/common';
import { ConfigValidationService } from './config/config-validation.service';
import { StandingsModule } from '../standings/standings.module';

@Module({
  imports: [StandingsModule],
  providers: [ConfigValidationService],
  exports: [ConfigValidationService],
})
export class CommonModule {}
