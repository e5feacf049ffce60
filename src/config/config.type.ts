import { AppConfig } from './app-config.type';
import { GroundConfig } from '../ground/config/ground-config.type';

export type AllConfigType = {
  app: AppConfig;
  ground: GroundConfig;
};
