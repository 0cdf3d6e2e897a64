import type { EmbeddingsConfig } from "../config.js";
import type { EmbeddingStore } from "./embedding-store.js";
import { InMemoryEmbeddingStore } from "./memory-store.js";
import { OracleEmbeddingStore } from "./oracle-store.js";

export async function createEmbeddingStore({ store, oracle }: EmbeddingsConfig): Promise<EmbeddingStore> {
  if (store === "oracle") {
    if (!oracle) throw new Error("EMBEDDING_STORE=oracle needs the ORACLE_DB_* settings.");
    return OracleEmbeddingStore.connect(oracle);
  }
  return new InMemoryEmbeddingStore();
}
