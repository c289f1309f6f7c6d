import { Module } from '@nestjs/common';
import { AppConfigModule } from './config/index.js';
import { SearchModule } from './search/index.js';

@Module({
  imports: [AppConfigModule, SearchModule],
})
export class AppModule {}
