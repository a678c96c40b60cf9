import { Injectable, Logger } from '@nestjs/common';
import { GetCommand } from '@aws-sdk/lib-dynamodb';
import { AwsService } from '../config/aws.service';
import { ConfigService } from '../config/config.service';
import { Clock } from '../common/clock';
import { DispatchErrorCode, OtherCosts, Tariff, TariffQuote } from '@fletes/shared';
import { externalError, validationError } from '../common/dispatch-errors';
import {
  DynamoItem,
  readBoolean,
  readNumber,
  readOptionalNumber,
  readOptionalString,
  readRecord,
  readString,
} from '../common/dynamo-item.util';
import { sendOptions } from '../common/operation-context';
import { CatalogCache } from './catalog-cache';

function catalogKey(text: string): string {
  return text.trim().toUpperCase();
}

/**
 * Tariff oracle: route tariffs by (origin, destination) and per vehicle type
 * surcharges. Lookups fail closed.
 */
@Injectable()
export class TariffsService {
  private readonly logger = new Logger(TariffsService.name);
  private readonly tariffs: CatalogCache<Tariff>;
  private readonly otherCosts: CatalogCache<OtherCosts>;

  constructor(
    private readonly awsService: AwsService,
    private readonly configService: ConfigService,
    clock: Clock,
  ) {
    const ttl = () => this.configService.tariffCacheTtlMs;
    const now = () => clock.now().getTime();
    this.tariffs = new CatalogCache<Tariff>(ttl, now);
    this.otherCosts = new CatalogCache<OtherCosts>(ttl, now);
  }

  async findTariff(origin: string, destination: string, signal?: AbortSignal): Promise<Tariff | undefined> {
    const o = catalogKey(origin);
    const d = catalogKey(destination);
    return this.tariffs.getOrLoad(`${o}#${d}`, async () => {
      const item = await this.getCatalogItem(`TARIFF#${o}#${d}`, signal);
      return item ? this.mapItemToTariff(item, o, d) : undefined;
    });
  }

  async getTariff(origin: string, destination: string, signal?: AbortSignal): Promise<Tariff> {
    const tariff = await this.findTariff(origin, destination, signal);
    if (!tariff) {
      throw validationError({
        code: DispatchErrorCode.TariffMissing,
        message: `No existe tarifa para la ruta ${catalogKey(origin)} - ${catalogKey(destination)}`,
        context: { origin, destination },
      });
    }
    return tariff;
  }

  async findOtherCosts(vehicleType: string, signal?: AbortSignal): Promise<OtherCosts | undefined> {
    const type = catalogKey(vehicleType);
    return this.otherCosts.getOrLoad(type, async () => {
      const item = await this.getCatalogItem(`OTHER_COSTS#${type}`, signal);
      return item ? this.mapItemToOtherCosts(item, type) : undefined;
    });
  }

  async getOtherCosts(vehicleType: string, signal?: AbortSignal): Promise<OtherCosts> {
    const costs = await this.findOtherCosts(vehicleType, signal);
    if (!costs) {
      throw validationError({
        code: DispatchErrorCode.OtherCostsMissing,
        message: `No existen otros costos para el tipo de vehículo ${catalogKey(vehicleType)}`,
        context: { vehicleType },
      });
    }
    return costs;
  }

  /** Everything the pricing kernel needs for one bundle */
  async quote(origin: string, destination: string, billingVehicleType: string, signal?: AbortSignal): Promise<TariffQuote> {
    const type = catalogKey(billingVehicleType);
    const tariff = await this.getTariff(origin, destination, signal);
    const base = tariff.rates[type];
    if (base === undefined) {
      throw validationError({
        code: DispatchErrorCode.TariffMissing,
        message: `La tarifa ${tariff.origin} - ${tariff.destination} no tiene valor para el tipo de vehículo ${type}`,
        context: { origin: tariff.origin, destination: tariff.destination, vehicleType: type },
      });
    }
    const costs = await this.getOtherCosts(type, signal);

    return {
      billingVehicleType: type,
      base,
      paysLoadUnload: tariff.paysLoadUnload,
      extraPointValue: costs.extraPointValue,
      loadUnloadFee: costs.loadUnloadFee,
      costCenterCode: tariff.costCenterCode,
    };
  }

  clearCache(): void {
    this.tariffs.clear();
    this.otherCosts.clear();
  }

  private async getCatalogItem(pk: string, signal?: AbortSignal): Promise<DynamoItem | undefined> {
    try {
      const result = await this.awsService.getDynamoDBClient().send(
        new GetCommand({
          TableName: this.configService.catalogTableName,
          Key: { PK: pk, SK: 'METADATA' },
        }),
        sendOptions({ signal }),
      );
      return result.Item;
    } catch (error: unknown) {
      this.logger.error(`Catalog lookup failed for ${pk}`, error);
      throw externalError({
        code: DispatchErrorCode.StoreUnavailable,
        message: 'No fue posible consultar las tarifas',
        context: { key: pk },
      });
    }
  }

  private mapItemToTariff(item: DynamoItem, origin: string, destination: string): Tariff {
    const rates: Record<string, number> = {};
    for (const [vehicleType, amount] of Object.entries(readRecord(item, 'rates'))) {
      if (typeof amount === 'number') {
        rates[catalogKey(vehicleType)] = amount;
      }
    }
    return {
      origin,
      destination,
      routeName: readOptionalString(item, 'routeName'),
      tripKind: readOptionalString(item, 'tripKind'),
      costCenterCode: readString(item, 'costCenterCode'),
      paysLoadUnload: readBoolean(item, 'paysLoadUnload'),
      rates,
    };
  }

  private mapItemToOtherCosts(item: DynamoItem, vehicleType: string): OtherCosts {
    return {
      vehicleType,
      maxPoints: readOptionalNumber(item, 'maxPoints'),
      extraPointValue: readNumber(item, 'extraPointValue'),
      loadUnloadFee: readNumber(item, 'loadUnloadFee'),
    };
  }
}
