import { Module } from '@nestjs/common';
import { KumruModule } from './kumru/kumru.module';

@Module({
  imports: [KumruModule],
})
export class AppModule {}
