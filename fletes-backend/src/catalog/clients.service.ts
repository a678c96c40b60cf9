import { Injectable, Logger } from '@nestjs/common';
import { GetCommand } from '@aws-sdk/lib-dynamodb';
import { AwsService } from '../config/aws.service';
import { ConfigService } from '../config/config.service';
import { Client, DispatchErrorCode } from '@fletes/shared';
import { externalError } from '../common/dispatch-errors';
import { DynamoItem, readOptionalString, readString } from '../common/dynamo-item.util';
import { sendOptions } from '../common/operation-context';

@Injectable()
export class ClientsService {
  private readonly logger = new Logger(ClientsService.name);

  constructor(
    private readonly awsService: AwsService,
    private readonly configService: ConfigService,
  ) {}

  async findByNit(nit: string, signal?: AbortSignal): Promise<Client | undefined> {
    const key = nit.trim();
    try {
      const result = await this.awsService.getDynamoDBClient().send(
        new GetCommand({
          TableName: this.configService.catalogTableName,
          Key: { PK: `CLIENT#${key}`, SK: 'METADATA' },
        }),
        sendOptions({ signal }),
      );
      return result.Item ? this.mapItemToClient(result.Item, key) : undefined;
    } catch (error: unknown) {
      this.logger.error(`Client lookup failed for ${key}`, error);
      throw externalError({
        code: DispatchErrorCode.StoreUnavailable,
        message: 'No fue posible consultar los clientes',
        context: { nit: key },
      });
    }
  }

  /** Lookup several NITs at once; unknown ones are absent from the map */
  async findMany(nits: Iterable<string>, signal?: AbortSignal): Promise<Map<string, Client>> {
    const unique = [...new Set([...nits].map(nit => nit.trim()))];
    const found = await Promise.all(unique.map(nit => this.findByNit(nit, signal)));
    const clients = new Map<string, Client>();
    found.forEach((client, i) => {
      if (client) {
        clients.set(unique[i], client);
      }
    });
    return clients;
  }

  private mapItemToClient(item: DynamoItem, nit: string): Client {
    return {
      nit,
      name: readString(item, 'name'),
      costCenterCode: readOptionalString(item, 'costCenterCode'),
      location: readOptionalString(item, 'location'),
      address: readOptionalString(item, 'address'),
      phone: readOptionalString(item, 'phone'),
      email: readOptionalString(item, 'email'),
      paymentMethod: readOptionalString(item, 'paymentMethod'),
    };
  }
}
