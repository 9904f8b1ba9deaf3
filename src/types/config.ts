export interface CatalogConfig {
  baseUrl: string;
  mediaHost: string;
  timeout: number;
  retryAttempts: number;
}

export interface TransferConfig {
  outputDirectory: string;
  command?: string;
  timeout: number;
}

export interface AppConfig {
  stateDirectory: string;
  catalog: CatalogConfig;
  transfer: TransferConfig;
  flushEvery: number;
}
