import { Module } from '@nestjs/common';
import { TariffsService } from './tariffs.service';
import { ClientsService } from './clients.service';

@Module({
  providers: [TariffsService, ClientsService],
  exports: [TariffsService, ClientsService],
})
export class CatalogModule {}
