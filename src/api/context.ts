import type { HarnessConfig } from '../config';
import type { InferenceClient } from '../llm/provider';
import type { Logger } from '../ui/logger';

export interface ApiContext {
  config: HarnessConfig;
  client?: InferenceClient;
  logger?: Logger;
  now?: () => Date;
}
