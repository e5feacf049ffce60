import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { AllConfigType } from '../config/config.type';
import { LedgerRowEntity } from '../ground/infrastructure/persistence/ledger-row.entity';

@Injectable()
export class TypeOrmConfigService implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService<AllConfigType>) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    return {
      type: 'better-sqlite3',
      database: this.configService.getOrThrow('ground.databasePath', {
        infer: true,
      }),
      synchronize: true,
      logging:
        this.configService.get('app.nodeEnv', { infer: true }) ===
        'development',
      entities: [LedgerRowEntity],
    };
  }
}
