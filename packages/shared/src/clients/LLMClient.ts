import { ChatOpenAI, OpenAIEmbeddings } from '@langchain/openai';

export interface LLMConfigs {
    baseUrl: string;
    apiKey: string;
    model: string;
    embeddingModel: string;
    temperature?: number;
}

// Ollama serves an OpenAI-compatible API, so the OpenAI bindings are pointed at it
export class LLMClient {
    private readonly configs: LLMConfigs;
    private chatModel?: ChatOpenAI;
    private embeddingModel?: OpenAIEmbeddings;

    constructor(configs: LLMConfigs) {
        this.configs = configs;
    }

    returnChatModel(): ChatOpenAI {
        if (!this.chatModel) {
            this.chatModel = new ChatOpenAI({
                model: this.configs.model,
                temperature: this.configs.temperature ?? 0.3,
                apiKey: this.configs.apiKey,
                maxRetries: 1,
                configuration: { baseURL: this.configs.baseUrl }
            });
            console.log('[LLMClient] Chat model ready:', this.configs.model);
        }
        return this.chatModel;
    }

    returnEmbeddingModel(): OpenAIEmbeddings {
        if (!this.embeddingModel) {
            this.embeddingModel = new OpenAIEmbeddings({
                model: this.configs.embeddingModel,
                apiKey: this.configs.apiKey,
                maxRetries: 1,
                configuration: { baseURL: this.configs.baseUrl }
            });
            console.log('[LLMClient] Embedding model ready:', this.configs.embeddingModel);
        }
        return this.embeddingModel;
    }
}
