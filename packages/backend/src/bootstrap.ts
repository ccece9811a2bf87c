import type { Knex } from 'knex';
import type { DischargeConfig } from './config.js';
import type { Logger } from './logger.js';
import { createDb } from './db/connection.js';
import { FileKeyValueStore } from './store/file-store.js';
import { KnexKeyValueStore } from './store/knex-store.js';
import type { KeyValueStore } from './store/key-value-store.js';
import { BedrockConverseClient, type ConverseClient } from './llm/converse-client.js';
import { createDefaultProviders } from './checks/index.js';
import { JsonReferenceDataSource } from './checks/reference-data.js';
import { BedrockNarrativeGenerator } from './narrative/bedrock-narrative.js';
import { TemplateNarrativeGenerator, type NarrativeGenerator } from './narrative/narrative.js';
import { DischargeOrchestrator } from './engine/orchestrator.js';

export interface Runtime {
  orchestrator: DischargeOrchestrator;
  store: KeyValueStore;
  close(): Promise<void>;
}

function createStore(config: DischargeConfig): { store: KeyValueStore; db: Knex | null } {
  if (config.storage.driver === 'mysql') {
    const db = createDb(config.db);
    return { store: new KnexKeyValueStore(db), db };
  }
  return { store: new FileKeyValueStore(config.storage.outputDir), db: null };
}

/** Wire the engine from configuration. The caller owns `close()`. */
export function createRuntime(config: DischargeConfig, logger: Logger): Runtime {
  const { store, db } = createStore(config);

  const client: ConverseClient | null = config.bedrock.enabled
    ? new BedrockConverseClient({ region: config.bedrock.region, modelId: config.bedrock.modelId })
    : null;
  const narrative: NarrativeGenerator = client
    ? new BedrockNarrativeGenerator(client)
    : new TemplateNarrativeGenerator();

  logger.info(
    { storage: store.driver, llm: client ? client.modelId : 'disabled', referenceData: config.checks.referenceDataDir },
    'Discharge runtime configured',
  );

  const orchestrator = new DischargeOrchestrator({
    config,
    providers: createDefaultProviders(client),
    referenceData: new JsonReferenceDataSource(config.checks.referenceDataDir, logger),
    narrative,
    store,
    logger,
  });

  return {
    orchestrator,
    store,
    async close() {
      if (db) await db.destroy();
    },
  };
}
