import { Module } from '@nestjs/common';
import { DownloadModule } from '../download/download.module';
import { ForecastDateResolverService } from './forecast-date-resolver.service';
import { ForecastSourceService } from './forecast-source.service';
import { ForecastXmlParserService } from './forecast-xml-parser.service';
import { GeographicSorterService } from './geographic-sorter.service';

@Module({
  imports: [DownloadModule],
  providers: [
    ForecastXmlParserService,
    ForecastDateResolverService,
    GeographicSorterService,
    ForecastSourceService,
  ],
  exports: [
    ForecastXmlParserService,
    ForecastDateResolverService,
    GeographicSorterService,
    ForecastSourceService,
  ],
})
export class ForecastModule {}
