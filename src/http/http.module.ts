import { Module } from '@nestjs/common';
import { HttpFetchService } from './http-fetch.service';

@Module({
  providers: [HttpFetchService],
  exports: [HttpFetchService],
})
export class HttpModule {}
