import { Injectable, Logger } from '@nestjs/common';
import {
  QueryCommand,
  QueryCommandInput,
  TransactWriteCommand,
  TransactWriteCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { AwsService } from '../config/aws.service';
import { ConfigService } from '../config/config.service';
import {
  Bundle,
  BundleAuditEntry,
  BundleSnapshot,
  DispatchErrorCode,
  DispatchErrorKind,
  DispatchLine,
} from '@fletes/shared';
import {
  awsErrorName,
  dispatchPayloadOf,
  externalError,
  stateError,
  validationError,
} from '../common/dispatch-errors';
import { DynamoItem, readString } from '../common/dynamo-item.util';
import { assertNotCancelled, OperationContext, sendOptions } from '../common/operation-context';
import {
  AUDIT_SK_PREFIX,
  BUNDLE_METADATA_SK,
  LINE_SK_PREFIX,
  bundlePk,
  integraGsiPk,
  lineSk,
  stateGsiPk,
} from './bundle-keys';
import {
  fromAuditItem,
  fromBundleItem,
  fromLineItem,
  toAuditItem,
  toBundleItem,
  toLineItem,
} from './bundle-item.mapper';
import { ACTIVE_BUNDLE_STATES, BundleArchival, BundleChangeSet, BundleQuery, BundleStore } from './bundle-store';

type StoreContext = Pick<OperationContext, 'signal'>;
type TransactItem = NonNullable<TransactWriteCommandInput['TransactItems']>[number];

/** DynamoDB rejects transactions with more actions than this */
export const MAX_TRANSACT_ITEMS = 100;

interface PartitionItems {
  bundle?: DynamoItem;
  lines: DynamoItem[];
}

@Injectable()
export class DynamoBundleStore extends BundleStore {
  private readonly logger = new Logger(DynamoBundleStore.name);

  constructor(
    private readonly awsService: AwsService,
    private readonly configService: ConfigService,
  ) {
    super();
  }

  private get activeTable(): string {
    return this.configService.activeLinesTableName;
  }

  private get completedTable(): string {
    return this.configService.completedLinesTableName;
  }

  private get ddb() {
    return this.awsService.getDynamoDBClient();
  }

  // ── Reads ───────────────────────────────────────────────────────

  async getSnapshot(vehicleConsecutive: string, ctx?: StoreContext): Promise<BundleSnapshot | undefined> {
    const partition = await this.readPartition(vehicleConsecutive, ctx);
    if (!partition.bundle) {
      return undefined;
    }
    return {
      bundle: fromBundleItem(partition.bundle),
      lines: partition.lines.map(fromLineItem),
    };
  }

  async findLinesByIntegraConsecutive(integraConsecutive: string, ctx?: StoreContext): Promise<DispatchLine[]> {
    const items = await this.queryAll(
      {
        TableName: this.activeTable,
        IndexName: 'GSI2',
        KeyConditionExpression: 'GSI2PK = :pk',
        ExpressionAttributeValues: { ':pk': integraGsiPk(integraConsecutive) },
      },
      ctx,
    );
    return items.map(fromLineItem);
  }

  async listBundles(query: BundleQuery, ctx?: StoreContext): Promise<BundleSnapshot[]> {
    const states = query.states ?? ACTIVE_BUNDLE_STATES;
    const regions: Array<string | undefined> = query.regions ?? [undefined];

    const pages = await Promise.all(
      states.flatMap(state =>
        regions.map(region =>
          this.queryAll(
            {
              TableName: this.activeTable,
              IndexName: 'GSI1',
              KeyConditionExpression: region ? 'GSI1PK = :pk AND begins_with(GSI1SK, :region)' : 'GSI1PK = :pk',
              ExpressionAttributeValues: region
                ? { ':pk': stateGsiPk(state), ':region': `${region}#` }
                : { ':pk': stateGsiPk(state) },
            },
            ctx,
          ),
        ),
      ),
    );

    const ids = pages.flat().map(item => readString(item, 'vehicleConsecutive'));
    const snapshots = await Promise.all(ids.map(id => this.getSnapshot(id, ctx)));
    return snapshots
      .filter((s): s is BundleSnapshot => s !== undefined)
      .sort((a, b) => a.bundle.vehicleConsecutive.localeCompare(b.bundle.vehicleConsecutive));
  }

  async getAuditTrail(vehicleConsecutive: string, ctx?: StoreContext): Promise<BundleAuditEntry[]> {
    const items = await this.queryAll(
      {
        TableName: this.activeTable,
        KeyConditionExpression: 'PK = :pk AND begins_with(SK, :sk)',
        ExpressionAttributeValues: { ':pk': bundlePk(vehicleConsecutive), ':sk': AUDIT_SK_PREFIX },
        ScanIndexForward: true,
      },
      ctx,
    );
    return items.map(fromAuditItem);
  }

  // ── Writes ──────────────────────────────────────────────────────

  async commit(changes: BundleChangeSet, ctx?: StoreContext): Promise<void> {
    assertNotCancelled(ctx);
    const items = this.toTransactItems(changes);
    if (items.length === 0) {
      return;
    }
    await this.transact(items, ctx, changes);
  }

  async archiveBundle(archival: BundleArchival, ctx?: StoreContext): Promise<void> {
    const { bundle, expectedVersion, lines, audit = [] } = archival;
    const vehicleConsecutive = bundle.vehicleConsecutive;
    const pk = bundlePk(vehicleConsecutive);

    const items: TransactItem[] = [
      {
        Put: {
          TableName: this.completedTable,
          Item: toBundleItem({ ...bundle, version: expectedVersion + 1 }),
        },
      },
      ...lines.map((line): TransactItem => ({ Put: { TableName: this.completedTable, Item: toLineItem(line) } })),
      {
        Delete: {
          TableName: this.activeTable,
          Key: { PK: pk, SK: BUNDLE_METADATA_SK },
          ConditionExpression: '#version = :expected',
          ExpressionAttributeNames: { '#version': 'version' },
          ExpressionAttributeValues: { ':expected': expectedVersion },
        },
      },
      ...lines.map((line): TransactItem => ({
        Delete: { TableName: this.activeTable, Key: { PK: pk, SK: lineSk(line.lineId) } },
      })),
      ...audit.map((entry): TransactItem => ({ Put: { TableName: this.activeTable, Item: toAuditItem(entry) } })),
    ];

    if (items.length > MAX_TRANSACT_ITEMS) {
      throw validationError({
        code: DispatchErrorCode.BundleTooLarge,
        message: `El vehículo ${vehicleConsecutive} tiene ${lines.length} pedidos y no puede archivarse en una sola operación`,
        context: { bundleId: vehicleConsecutive, lines: lines.length },
      });
    }
    assertNotCancelled(ctx, vehicleConsecutive);

    try {
      await this.transact(items, ctx, { deleteBundles: [{ vehicleConsecutive, expectedVersion }] });
    } catch (error: unknown) {
      if (dispatchPayloadOf(error)?.kind !== DispatchErrorKind.External) {
        throw error;
      }
      this.logger.error(`Archival of ${vehicleConsecutive} failed`, error);
      throw externalError({
        code: DispatchErrorCode.ArchivalFailed,
        message: `No fue posible archivar el vehículo ${vehicleConsecutive}`,
        context: { bundleId: vehicleConsecutive },
      });
    }
  }

  // ── Helpers ─────────────────────────────────────────────────────

  private toTransactItems(changes: BundleChangeSet): TransactItem[] {
    const items: TransactItem[] = [];

    for (const { bundle, expectedVersion } of changes.bundles ?? []) {
      items.push(this.putBundleItem(bundle, expectedVersion));
    }
    for (const deletion of changes.deleteBundles ?? []) {
      items.push({
        Delete: {
          TableName: this.activeTable,
          Key: { PK: bundlePk(deletion.vehicleConsecutive), SK: BUNDLE_METADATA_SK },
          ConditionExpression: '#version = :expected',
          ExpressionAttributeNames: { '#version': 'version' },
          ExpressionAttributeValues: { ':expected': deletion.expectedVersion },
        },
      });
    }
    for (const key of changes.deleteLines ?? []) {
      items.push({
        Delete: {
          TableName: this.activeTable,
          Key: { PK: bundlePk(key.vehicleConsecutive), SK: lineSk(key.lineId) },
        },
      });
    }
    for (const line of changes.putLines ?? []) {
      items.push({ Put: { TableName: this.activeTable, Item: toLineItem(line) } });
    }
    for (const entry of changes.audit ?? []) {
      items.push({ Put: { TableName: this.activeTable, Item: toAuditItem(entry) } });
    }

    return items;
  }

  private putBundleItem(bundle: Bundle, expectedVersion?: number): TransactItem {
    const stored: Bundle = { ...bundle, version: (expectedVersion ?? 0) + 1 };
    if (expectedVersion === undefined) {
      return {
        Put: {
          TableName: this.activeTable,
          Item: toBundleItem(stored),
          ConditionExpression: 'attribute_not_exists(PK)',
        },
      };
    }
    return {
      Put: {
        TableName: this.activeTable,
        Item: toBundleItem(stored),
        ConditionExpression: '#version = :expected',
        ExpressionAttributeNames: { '#version': 'version' },
        ExpressionAttributeValues: { ':expected': expectedVersion },
      },
    };
  }

  private async transact(items: TransactItem[], ctx?: StoreContext, changes?: BundleChangeSet): Promise<void> {
    for (let i = 0; i < items.length; i += MAX_TRANSACT_ITEMS) {
      const chunk = items.slice(i, i + MAX_TRANSACT_ITEMS);
      try {
        await this.ddb.send(new TransactWriteCommand({ TransactItems: chunk }), sendOptions(ctx));
      } catch (error: unknown) {
        const name = awsErrorName(error);
        const bundleIds = [
          ...(changes?.bundles ?? []).map(w => w.bundle.vehicleConsecutive),
          ...(changes?.deleteBundles ?? []).map(d => d.vehicleConsecutive),
        ];
        if (name === 'TransactionCanceledException' || name === 'ConditionalCheckFailedException') {
          throw stateError({
            code: DispatchErrorCode.ConcurrentModification,
            message: 'El vehículo fue modificado por otra operación; consulte de nuevo e intente otra vez',
            context: { bundleIds },
          });
        }
        this.logger.error('Bundle store write failed', error);
        throw externalError({
          code: DispatchErrorCode.StoreUnavailable,
          message: 'No fue posible guardar los cambios de los vehículos',
          context: { bundleIds },
        });
      }
    }
  }

  private async readPartition(vehicleConsecutive: string, ctx?: StoreContext): Promise<PartitionItems> {
    const items = await this.queryAll(
      {
        TableName: this.activeTable,
        KeyConditionExpression: 'PK = :pk',
        ExpressionAttributeValues: { ':pk': bundlePk(vehicleConsecutive) },
      },
      ctx,
    );

    const partition: PartitionItems = { lines: [] };
    for (const item of items) {
      const sk = readString(item, 'SK');
      if (sk === BUNDLE_METADATA_SK) {
        partition.bundle = item;
      } else if (sk.startsWith(LINE_SK_PREFIX)) {
        partition.lines.push(item);
      }
    }
    return partition;
  }

  private async queryAll(input: QueryCommandInput, ctx?: StoreContext): Promise<DynamoItem[]> {
    const items: DynamoItem[] = [];
    let exclusiveStartKey: DynamoItem | undefined;
    try {
      do {
        const result = await this.ddb.send(
          new QueryCommand({ ...input, ExclusiveStartKey: exclusiveStartKey }),
          sendOptions(ctx),
        );
        items.push(...(result.Items ?? []));
        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);
    } catch (error: unknown) {
      this.logger.error(`Bundle store query failed on ${input.TableName}`, error);
      throw externalError({
        code: DispatchErrorCode.StoreUnavailable,
        message: 'No fue posible consultar los vehículos',
      });
    }
    return items;
  }
}
