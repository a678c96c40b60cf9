import { Module } from '@nestjs/common';
import { AccessModule } from '../access/access.module';
import { AuditModule } from '../audit/audit.module';
import { ActingUserGuard } from '../auth/guards/acting-user.guard';
import { BundlesModule } from '../bundles/bundles.module';
import { CatalogModule } from '../catalog/catalog.module';
import { UsersModule } from '../users/users.module';
import { AdjustService } from './adjust.service';
import { BundlePricingService } from './bundle-pricing.service';
import { CompletionService } from './completion.service';
import { DispatchWorkflowService } from './dispatch-workflow.service';
import { ExportService } from './export.service';
import { IngestService } from './ingest.service';
import { MergeService } from './merge.service';
import { PedidosController } from './pedidos.controller';
import { PedidosQueryService } from './pedidos-query.service';
import { SplitService } from './split.service';
import { StatusWorkflowService } from './status-workflow.service';

@Module({
  imports: [AccessModule, AuditModule, BundlesModule, CatalogModule, UsersModule],
  controllers: [PedidosController],
  providers: [
    ActingUserGuard,
    StatusWorkflowService,
    BundlePricingService,
    IngestService,
    PedidosQueryService,
    DispatchWorkflowService,
    AdjustService,
    MergeService,
    SplitService,
    ExportService,
    CompletionService,
  ],
  exports: [StatusWorkflowService, BundlePricingService],
})
export class PedidosModule {}
