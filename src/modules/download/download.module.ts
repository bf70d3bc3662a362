import { Module } from '@nestjs/common';
import { ForecastArchiveService } from './forecast-archive.service';
import { ForecastDownloadService } from './forecast-download.service';

@Module({
  providers: [ForecastArchiveService, ForecastDownloadService],
  exports: [ForecastArchiveService, ForecastDownloadService],
})
export class DownloadModule {}
