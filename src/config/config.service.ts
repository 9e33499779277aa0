import { Injectable } from '@nestjs/common';

export type StorageDriver = 'memory' | 'dynamodb';

export interface AwsConfig {
  region: string;
  claimsTableName: string;
  registryTableName: string;
}

export interface RegistryConfig {
  initialOwner: string;
  storageDriver: StorageDriver;
}

@Injectable()
export class ConfigService {
  private readonly awsConfig: AwsConfig;
  private readonly registryConfig: RegistryConfig;
  private readonly port: number;

  constructor() {
    this.awsConfig = {
      region: process.env.AWS_REGION || 'us-east-1',
      claimsTableName: process.env.CLAIMS_TABLE_NAME || 'claims-table',
      registryTableName: process.env.REGISTRY_TABLE_NAME || 'claim-registry'
    };
    this.registryConfig = {
      initialOwner: process.env.REGISTRY_OWNER?.trim() || 'registry-admin',
      storageDriver: process.env.STORAGE_DRIVER === 'dynamodb' ? 'dynamodb' : 'memory'
    };
    this.port = Number(process.env.PORT) || 3000;
  }

  getAws(): AwsConfig {
    return this.awsConfig;
  }

  getRegistry(): RegistryConfig {
    return this.registryConfig;
  }

  getPort(): number {
    return this.port;
  }
}
