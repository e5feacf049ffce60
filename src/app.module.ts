import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import appConfig from './config/app.config';
import groundConfig from './ground/config/ground.config';
import { TypeOrmConfigService } from './database/typeorm-config.service';
import { GroundModule } from './ground/ground.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, groundConfig],
      envFilePath: ['.env'],
    }),
    TypeOrmModule.forRootAsync({
      useClass: TypeOrmConfigService,
    }),
    GroundModule,
  ],
})
export class AppModule {}
