import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { ConfigService } from '../config/config.service';

@Injectable()
export class DynamoService implements OnModuleDestroy {
  private client: DynamoDBDocumentClient | null = null;

  constructor(private readonly config: ConfigService) {}

  // created on first use so the in-memory driver never builds an AWS client
  getDocumentClient(): DynamoDBDocumentClient {
    if (!this.client) {
      const aws = this.config.getAws();
      const dynamo = new DynamoDBClient({ region: aws.region });
      this.client = DynamoDBDocumentClient.from(dynamo, {
        marshallOptions: { removeUndefinedValues: true }
      });
    }
    return this.client;
  }

  onModuleDestroy(): void {
    this.client?.destroy();
    this.client = null;
  }
}
