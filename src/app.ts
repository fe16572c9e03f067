/**
 * Wires the pipeline from configuration.
 */

import type { Config } from './config.js';
import { AnswerSynthesizer } from './services/answer-synthesizer.js';
import { Store } from './services/database.js';
import { QueryExecutor } from './services/executor.js';
import { ExcelProvisioner } from './services/ingest.js';
import { LLMService, type LanguageModelClient } from './services/llm.js';
import { Pipeline } from './services/pipeline.js';
import { SchemaIntrospector } from './services/schema-introspector.js';
import { KeywordSqlAnalyzer } from './services/sql-analyzer.js';
import { SqlGenerator } from './services/sql-generator.js';

export interface AppContext {
  store: Store;
  pipeline: Pipeline;
}

export interface CreateAppOptions {
  store?: Store;
  llm?: LanguageModelClient;
  dataDir?: string;
}

/**
 * Build a store and a pipeline over it. Nothing connects until first use.
 */
export function createApp(config: Config, options: CreateAppOptions = {}): AppContext {
  const store = options.store ?? Store.fromConfig(config.KNEX_CONFIG);
  const llm = options.llm ?? new LLMService(config.LLM_CONFIG);

  const pipeline = new Pipeline({
    generator: new SqlGenerator(llm, new SchemaIntrospector(store), store.dialect),
    analyzer: new KeywordSqlAnalyzer(),
    executor: new QueryExecutor(store),
    synthesizer: new AnswerSynthesizer(llm),
    provisioner: new ExcelProvisioner(store, options.dataDir ?? config.DATA_DIR),
  });

  return { store, pipeline };
}
