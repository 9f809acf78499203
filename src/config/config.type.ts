import { AppConfig } from './app-config.type';
import { DatabaseConfig } from '../database/config/database-config.type';
import { ApprovalsConfig } from '../approvals/config/approvals-config.type';

export type AllConfigType = {
  app: AppConfig;
  database: DatabaseConfig;
  approvals: ApprovalsConfig;
};
