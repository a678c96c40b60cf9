import { Injectable, Logger } from '@nestjs/common';
import { GetCommand } from '@aws-sdk/lib-dynamodb';
import { AwsService } from '../config/aws.service';
import { ConfigService } from '../config/config.service';
import { DispatchErrorCode, DispatchUser, UserRole } from '@fletes/shared';
import { authorizationError, externalError } from '../common/dispatch-errors';
import { DynamoItem, readBoolean, readOptionalString, readString } from '../common/dynamo-item.util';
import { sendOptions } from '../common/operation-context';

/**
 * Read-only view of the user directory. The engine never writes users; it
 * only needs the role and region of whoever is acting.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);
  private readonly usersTableName: string;

  constructor(
    private readonly awsService: AwsService,
    private readonly configService: ConfigService,
  ) {
    this.usersTableName = this.configService.usersTableName;
  }

  async getActingUser(username: string | undefined, signal?: AbortSignal): Promise<DispatchUser> {
    const normalized = (username || '').trim().toUpperCase();
    if (!normalized) {
      throw authorizationError({
        code: DispatchErrorCode.UserNotFound,
        message: 'No se indicó el usuario que realiza la operación',
      });
    }

    let item: DynamoItem | undefined;
    try {
      const result = await this.awsService.getDynamoDBClient().send(
        new GetCommand({
          TableName: this.usersTableName,
          Key: { PK: `USER#${normalized}`, SK: 'METADATA' },
        }),
        sendOptions({ signal }),
      );
      item = result.Item;
    } catch (error: unknown) {
      this.logger.error(`User directory lookup failed for ${normalized}`, error);
      throw externalError({
        code: DispatchErrorCode.DirectoryUnavailable,
        message: 'No fue posible consultar el directorio de usuarios',
        context: { username: normalized },
      });
    }

    const user = item ? this.mapItemToUser(item) : undefined;
    if (!user) {
      throw authorizationError({
        code: DispatchErrorCode.UserNotFound,
        message: `El usuario ${normalized} no existe o está inactivo`,
        context: { username: normalized },
      });
    }
    return user;
  }

  private mapItemToUser(item: DynamoItem): DispatchUser | undefined {
    const rawRole = readString(item, 'role').toUpperCase();
    const role = Object.values(UserRole).find(r => r === rawRole);
    const active = readBoolean(item, 'active', true);
    if (!role || !active) {
      return undefined;
    }
    return {
      username: readString(item, 'username').toUpperCase(),
      role,
      region: readString(item, 'region').trim().toUpperCase(),
      fullName: readOptionalString(item, 'fullName'),
      active,
    };
  }
}
