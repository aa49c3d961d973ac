import OpenAI from 'openai';
import type { Config } from '../../config/index.js';

export class EmbeddingClientFactory {
  /**
   * Plain OpenAI by default. With an Azure endpoint configured, requests go to the
   * deployment named by the embedding model.
   */
  static create(settings: Config['embedding']): OpenAI {
    const { apiKey, model, azureEndpoint, azureApiVersion } = settings;

    if (azureEndpoint && azureApiVersion) {
      return new OpenAI({
        apiKey,
        baseURL: `${azureEndpoint.replace(/\/$/, '')}/openai/deployments/${model}`,
        defaultQuery: { 'api-version': azureApiVersion },
        defaultHeaders: { 'api-key': apiKey },
        maxRetries: 0,
      });
    }

    // Retries happen in the retrieval pipeline, not inside the SDK.
    return new OpenAI({ apiKey, maxRetries: 0, timeout: 30_000 });
  }
}
