import { Injectable, Logger } from '@nestjs/common';
import { ConditionalCheckFailedException, TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import {
  BatchGetCommand,
  BatchGetCommandInput,
  BatchGetCommandOutput,
  GetCommand,
  PutCommand,
  TransactWriteCommand,
  UpdateCommand
} from '@aws-sdk/lib-dynamodb';
import { ClaimDraft, ClaimRepository, RegistryState } from '../claims/ports/claim-repository';
import { Claim, ClaimStatus, isClaimStatus } from '../claims/domain/claim';
import { DynamoService } from './dynamo.service';
import { ConfigService } from '../config/config.service';

const REGISTRY_KEY = { id: 'registry' };
const MAX_CREATE_ATTEMPTS = 3;
const BATCH_GET_LIMIT = 100;

type KeyList = NonNullable<BatchGetCommandInput['RequestItems']>[string]['Keys'];

export function customerKey(customerIdHash: string): { id: string } {
  return { id: `customer#${customerIdHash}` };
}

export interface ClaimItem {
  claimId: number;
  customerIdHash: string;
  amount: string;
  claimDate: number;
  status: number;
}

export function toClaimItem(claim: Claim): ClaimItem {
  return {
    claimId: claim.claimId,
    customerIdHash: claim.customerIdHash,
    amount: claim.amount.toString(),
    claimDate: claim.claimDate,
    status: claim.status
  };
}

export function fromClaimItem(item: Record<string, unknown>): Claim {
  const { claimId, customerIdHash, amount, claimDate, status } = item;
  if (
    typeof claimId !== 'number' ||
    typeof customerIdHash !== 'string' ||
    typeof amount !== 'string' ||
    typeof claimDate !== 'number' ||
    typeof status !== 'number' ||
    !isClaimStatus(status)
  ) {
    throw new Error(`Malformed claim item ${JSON.stringify(item)}`);
  }
  return { claimId, customerIdHash, amount: BigInt(amount), claimDate, status };
}

@Injectable()
export class DynamoClaimRepository implements ClaimRepository {
  private readonly logger = new Logger(DynamoClaimRepository.name);

  constructor(
    private readonly dynamo: DynamoService,
    private readonly config: ConfigService
  ) {}

  async initialize(owner: string): Promise<boolean> {
    const aws = this.config.getAws();
    const client = this.dynamo.getDocumentClient();
    const command = new PutCommand({
      TableName: aws.registryTableName,
      Item: { ...REGISTRY_KEY, nextClaimId: 1, owner },
      ConditionExpression: 'attribute_not_exists(id)'
    });
    try {
      await client.send(command);
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        this.logger.log(`Registry state already present in ${aws.registryTableName}`);
        return false;
      }
      throw error;
    }
    return true;
  }

  async getRegistryState(): Promise<RegistryState> {
    const aws = this.config.getAws();
    const client = this.dynamo.getDocumentClient();
    const result = await client.send(
      new GetCommand({ TableName: aws.registryTableName, Key: REGISTRY_KEY, ConsistentRead: true })
    );
    const item = result.Item;
    if (!item || typeof item.nextClaimId !== 'number') {
      throw new Error('Claim registry has not been initialized');
    }
    return {
      nextClaimId: item.nextClaimId,
      owner: typeof item.owner === 'string' ? item.owner : null
    };
  }

  async setOwner(owner: string | null): Promise<void> {
    const aws = this.config.getAws();
    const client = this.dynamo.getDocumentClient();
    await client.send(
      new UpdateCommand({
        TableName: aws.registryTableName,
        Key: REGISTRY_KEY,
        UpdateExpression: 'SET #owner = :owner',
        ExpressionAttributeNames: { '#owner': 'owner' },
        ExpressionAttributeValues: { ':owner': owner }
      })
    );
  }

  /**
   * Advances the counter, writes the claim and appends to the customer's id list in one
   * transaction. The counter update is conditioned on the value read, so a concurrent
   * writer cancels the transaction instead of sharing an identifier.
   */
  async createNext(draft: ClaimDraft): Promise<Claim> {
    const aws = this.config.getAws();
    const client = this.dynamo.getDocumentClient();

    for (let attempt = 1; ; attempt++) {
      const { nextClaimId } = await this.getRegistryState();
      const claim: Claim = { ...draft, claimId: nextClaimId };
      const command = new TransactWriteCommand({
        TransactItems: [
          {
            Update: {
              TableName: aws.registryTableName,
              Key: REGISTRY_KEY,
              UpdateExpression: 'SET nextClaimId = :next',
              ConditionExpression: 'nextClaimId = :expected',
              ExpressionAttributeValues: { ':next': nextClaimId + 1, ':expected': nextClaimId }
            }
          },
          {
            Put: {
              TableName: aws.claimsTableName,
              Item: toClaimItem(claim),
              ConditionExpression: 'attribute_not_exists(claimId)'
            }
          },
          {
            Update: {
              TableName: aws.registryTableName,
              Key: customerKey(claim.customerIdHash),
              UpdateExpression: 'SET claimIds = list_append(if_not_exists(claimIds, :empty), :ids)',
              ExpressionAttributeValues: { ':empty': [], ':ids': [nextClaimId] }
            }
          }
        ]
      });

      try {
        await client.send(command);
        return claim;
      } catch (error) {
        if (error instanceof TransactionCanceledException && attempt < MAX_CREATE_ATTEMPTS) {
          this.logger.warn(`Claim ${nextClaimId} write cancelled (attempt ${attempt}); re-reading counter`);
          continue;
        }
        throw error;
      }
    }
  }

  async getById(claimId: number): Promise<Claim | null> {
    const aws = this.config.getAws();
    const client = this.dynamo.getDocumentClient();
    const command = new GetCommand({
      TableName: aws.claimsTableName,
      Key: { claimId },
      ConsistentRead: true
    });
    const result = await client.send(command);
    return result.Item ? fromClaimItem(result.Item) : null;
  }

  async updateStatus(claimId: number, expected: ClaimStatus, status: ClaimStatus): Promise<boolean> {
    const aws = this.config.getAws();
    const client = this.dynamo.getDocumentClient();
    const command = new UpdateCommand({
      TableName: aws.claimsTableName,
      Key: { claimId },
      UpdateExpression: 'SET #status = :status',
      ConditionExpression: 'attribute_exists(claimId) AND #status = :expected',
      ExpressionAttributeNames: { '#status': 'status' },
      ExpressionAttributeValues: { ':status': status, ':expected': expected }
    });
    try {
      await client.send(command);
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        this.logger.warn(`Claim ${claimId} status changed concurrently; update skipped`);
        return false;
      }
      throw error;
    }
    return true;
  }

  async findByCustomerHash(customerIdHash: string): Promise<Claim[]> {
    const aws = this.config.getAws();
    const client = this.dynamo.getDocumentClient();
    const index = await client.send(
      new GetCommand({ TableName: aws.registryTableName, Key: customerKey(customerIdHash), ConsistentRead: true })
    );
    const stored: unknown = index.Item?.claimIds;
    const ids = Array.isArray(stored) ? stored.filter((id): id is number => typeof id === 'number') : [];
    const claims: Claim[] = [];

    for (let offset = 0; offset < ids.length; offset += BATCH_GET_LIMIT) {
      let keys: KeyList = ids.slice(offset, offset + BATCH_GET_LIMIT).map((claimId) => ({ claimId }));
      while (keys && keys.length > 0) {
        const result: BatchGetCommandOutput = await client.send(
          new BatchGetCommand({
            RequestItems: { [aws.claimsTableName]: { Keys: keys, ConsistentRead: true } }
          })
        );
        for (const item of result.Responses?.[aws.claimsTableName] ?? []) {
          claims.push(fromClaimItem(item));
        }
        keys = result.UnprocessedKeys?.[aws.claimsTableName]?.Keys;
      }
    }

    return claims.sort((a, b) => a.claimId - b.claimId);
  }
}
