import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Query,
  Res,
  StreamableFile,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Response } from 'express';
import {
  AdjustBundleDto,
  AuthorizeBundleDto,
  BulkAuthorizeDto,
  BulkOperationResult,
  BundleAuditTrail,
  BundleFiltersDto,
  BundleListing,
  DispatchErrorCode,
  ExportRow,
  IngestBatchDto,
  IngestSummary,
  LoadPedidoNumbersDto,
  LoadPedidoNumbersResult,
  MergeBundlesDto,
  SplitBundleDto,
} from '@fletes/shared';
import { ActingUserGuard } from '../auth/guards/acting-user.guard';
import { Operation } from '../auth/decorators/operation-context.decorator';
import { validationError } from '../common/dispatch-errors';
import { OperationContext } from '../common/operation-context';
import { AdjustService } from './adjust.service';
import { CompletionService } from './completion.service';
import { BundleDeletionResult, DispatchWorkflowService } from './dispatch-workflow.service';
import { ExportService, XLSX_CONTENT_TYPE } from './export.service';
import { IngestService } from './ingest.service';
import { MAX_WORKBOOK_BYTES, parseIngestWorkbook } from './ingest-workbook.parser';
import { MergeService } from './merge.service';
import { PedidosQueryService } from './pedidos-query.service';
import { SplitService } from './split.service';

@Controller('pedidos')
@UseGuards(ActingUserGuard)
export class PedidosController {
  constructor(
    private readonly ingestService: IngestService,
    private readonly queryService: PedidosQueryService,
    private readonly workflowService: DispatchWorkflowService,
    private readonly adjustService: AdjustService,
    private readonly mergeService: MergeService,
    private readonly splitService: SplitService,
    private readonly exportService: ExportService,
    private readonly completionService: CompletionService,
  ) {}

  /**
   * POST /pedidos/cargue
   * Ingest a batch of already-parsed rows
   */
  @Post('cargue')
  async ingestRows(@Operation() ctx: OperationContext, @Body() dto: IngestBatchDto): Promise<IngestSummary> {
    return this.ingestService.ingest(dto.rows, ctx);
  }

  /**
   * POST /pedidos/cargue-masivo
   * Ingest the first sheet of an uploaded workbook (field `archivo`)
   */
  @Post('cargue-masivo')
  @UseInterceptors(FileInterceptor('archivo', { limits: { fileSize: MAX_WORKBOOK_BYTES } }))
  async ingestWorkbook(
    @Operation() ctx: OperationContext,
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<IngestSummary> {
    if (!file) {
      throw validationError({
        code: DispatchErrorCode.RequiredField,
        message: 'Adjunte el archivo de pedidos en el campo archivo',
        region: ctx.actor.region,
      });
    }
    return this.ingestService.ingest(parseIngestWorkbook(file.buffer), ctx);
  }

  @Get()
  async listBundles(@Operation() ctx: OperationContext, @Query() filters: BundleFiltersDto): Promise<BundleListing[]> {
    return this.queryService.listBundles(filters, ctx);
  }

  /**
   * GET /pedidos/exportar-autorizados
   * Billing workbook of every authorized line
   */
  @Get('exportar-autorizados')
  async exportWorkbook(
    @Operation() ctx: OperationContext,
    @Res({ passthrough: true }) res: Response,
  ): Promise<StreamableFile> {
    const workbook = await this.exportService.exportWorkbook(ctx);
    res.set({
      'Content-Type': XLSX_CONTENT_TYPE,
      'Content-Disposition': `attachment; filename=${workbook.filename}`,
    });
    return new StreamableFile(workbook.buffer);
  }

  @Get('exportar-autorizados/filas')
  async exportRows(@Operation() ctx: OperationContext): Promise<ExportRow[]> {
    return this.exportService.exportRows(ctx);
  }

  /**
   * POST /pedidos/cargar-numeros
   * Completion feed: pedido numbers from the billing system
   */
  @Post('cargar-numeros')
  @HttpCode(HttpStatus.OK)
  async loadPedidoNumbers(
    @Operation() ctx: OperationContext,
    @Body() dto: LoadPedidoNumbersDto,
  ): Promise<LoadPedidoNumbersResult> {
    return this.completionService.loadPedidoNumbers(dto, ctx);
  }

  @Post('fusion')
  async merge(@Operation() ctx: OperationContext, @Body() dto: MergeBundlesDto): Promise<BundleListing> {
    return this.mergeService.merge(dto, ctx);
  }

  @Post('autorizar-masivo')
  @HttpCode(HttpStatus.OK)
  async authorizeMany(@Operation() ctx: OperationContext, @Body() dto: BulkAuthorizeDto): Promise<BulkOperationResult> {
    return this.workflowService.authorizeMany(dto.bundleIds, dto.observations, ctx);
  }

  @Get(':id')
  async getBundle(@Operation() ctx: OperationContext, @Param('id') bundleId: string): Promise<BundleListing> {
    return this.queryService.getBundle(bundleId, ctx);
  }

  @Get(':id/auditoria')
  async getAuditTrail(@Operation() ctx: OperationContext, @Param('id') bundleId: string): Promise<BundleAuditTrail> {
    return this.queryService.getAuditTrail(bundleId, ctx);
  }

  @Patch(':id/ajuste')
  async adjust(
    @Operation() ctx: OperationContext,
    @Param('id') bundleId: string,
    @Body() dto: AdjustBundleDto,
  ): Promise<BundleListing> {
    return this.adjustService.adjust(bundleId, dto, ctx);
  }

  @Post(':id/division')
  async split(
    @Operation() ctx: OperationContext,
    @Param('id') bundleId: string,
    @Body() dto: SplitBundleDto,
  ): Promise<BundleListing[]> {
    return this.splitService.split(bundleId, dto, ctx);
  }

  @Post(':id/confirmar')
  @HttpCode(HttpStatus.OK)
  async confirm(
    @Operation() ctx: OperationContext,
    @Param('id') bundleId: string,
    @Body() dto: AuthorizeBundleDto,
  ): Promise<BundleListing> {
    return this.workflowService.confirmPreauthorized(bundleId, dto.observations, ctx);
  }

  @Post(':id/autorizar')
  @HttpCode(HttpStatus.OK)
  async authorize(
    @Operation() ctx: OperationContext,
    @Param('id') bundleId: string,
    @Body() dto: AuthorizeBundleDto,
  ): Promise<BundleListing> {
    return this.workflowService.authorize(bundleId, dto.observations, ctx);
  }

  @Delete(':id')
  async deleteBundle(@Operation() ctx: OperationContext, @Param('id') bundleId: string): Promise<BundleDeletionResult> {
    return this.workflowService.deleteBundle(bundleId, ctx);
  }
}
