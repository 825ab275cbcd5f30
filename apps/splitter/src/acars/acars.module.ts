import { Module } from '@nestjs/common';

import { AcarsStreamService } from './acars-stream.service';
import { LogFileSplitterService } from './log-file-splitter.service';

@Module({
  providers: [LogFileSplitterService, AcarsStreamService],
  exports: [LogFileSplitterService, AcarsStreamService],
})
export class AcarsModule {}
