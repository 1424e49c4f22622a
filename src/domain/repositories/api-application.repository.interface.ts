/**
 * IApiApplicationRepository: persistence port for API application credentials.
 */
import type { ApiApplicationRecord, ApiApplicationCreateInput } from '../models/api-application.model';

export interface IApiApplicationRepository {
  findByAppId(appId: string): Promise<ApiApplicationRecord | null>;

  /** Insert or replace the application's token hash and scopes. */
  save(input: ApiApplicationCreateInput): Promise<ApiApplicationRecord>;
}
