import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { VoicesService } from './voices.service';

@Module({
  imports: [ConfigModule],
  providers: [VoicesService],
  exports: [VoicesService],
})
export class VoicesModule {}
