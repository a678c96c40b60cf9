import { Injectable } from '@nestjs/common';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { ConfigService } from './config.service';

@Injectable()
export class AwsService {
  private readonly dynamodbClient: DynamoDBDocumentClient;

  constructor(private readonly configService: ConfigService) {
    // Credentials come from the default provider chain (env vars, profile, role)
    const ddbClient = new DynamoDBClient({ region: this.configService.awsRegion });
    this.dynamodbClient = DynamoDBDocumentClient.from(ddbClient, {
      marshallOptions: {
        removeUndefinedValues: true,
        convertClassInstanceToMap: true,
      },
    });
  }

  getDynamoDBClient(): DynamoDBDocumentClient {
    return this.dynamodbClient;
  }
}
