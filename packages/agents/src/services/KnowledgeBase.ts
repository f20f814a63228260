import { readFileSync } from 'fs';
import { Document } from '@langchain/core/documents';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import { MemoryVectorStore } from 'langchain/vectorstores/memory';
import { z } from 'zod';

const CareArticleSchema = z.object({
    id: z.string().min(1),
    title: z.string().min(1),
    tags: z.array(z.string()),
    content: z.string().min(1)
});

export type CareArticle = z.infer<typeof CareArticleSchema>;

export interface ArticleMatch {
    article: CareArticle;
    score: number;
    method: 'embedding' | 'keyword';
}

const STOP_WORDS = new Set([
    'the', 'and', 'for', 'with', 'what', 'how', 'should', 'about', 'are', 'can', 'does',
    'this', 'that', 'from', 'when', 'who', 'why', 'has', 'have', 'been', 'into', 'after'
]);

export function tokenize(text: string): string[] {
    return text
        .toLowerCase()
        .split(/[^a-z0-9]+/)
        .filter(token => token.length > 2 && !STOP_WORDS.has(token));
}

export function loadCareArticles(path: URL = new URL('../../data/care-knowledge.json', import.meta.url)): CareArticle[] {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return z.array(CareArticleSchema).parse(raw);
}

export class KnowledgeBase {
    private readonly articles: CareArticle[];
    private readonly embeddings: EmbeddingsInterface | null;
    private store: Promise<MemoryVectorStore> | null = null;

    constructor(articles: CareArticle[], embeddings?: EmbeddingsInterface | null) {
        this.articles = articles;
        this.embeddings = embeddings ?? null;
    }

    get size(): number {
        return this.articles.length;
    }

    async search(query: string, k = 3): Promise<ArticleMatch[]> {
        if (this.embeddings) {
            try {
                return await this.similaritySearch(query, k);
            } catch (error) {
                // Rebuild on the next call, the embedding endpoint may come back
                this.store = null;
                console.warn('[KnowledgeBase] Embedding search failed, falling back to keyword match:', error);
            }
        }

        return this.keywordSearch(query, k);
    }

    keywordSearch(query: string, k = 3): ArticleMatch[] {
        const queryTokens = new Set(tokenize(query));
        if (queryTokens.size === 0) return [];

        return this.articles
            .map(article => {
                const articleTokens = new Set(tokenize(`${article.title} ${article.tags.join(' ')} ${article.content}`));
                let overlap = 0;
                for (const token of queryTokens) {
                    if (articleTokens.has(token)) overlap++;
                }
                return { article, score: overlap / queryTokens.size, method: 'keyword' as const };
            })
            .filter(match => match.score > 0)
            .sort((a, b) => b.score - a.score)
            .slice(0, k);
    }

    private async similaritySearch(query: string, k: number): Promise<ArticleMatch[]> {
        const store = await this.vectorStore();
        const results = await store.similaritySearchWithScore(query, k);

        const matches: ArticleMatch[] = [];
        for (const [document, score] of results) {
            const article = this.articles.find(candidate => candidate.id === document.metadata.id);
            if (article) matches.push({ article, score, method: 'embedding' });
        }
        return matches;
    }

    private vectorStore(): Promise<MemoryVectorStore> {
        const embeddings = this.embeddings;
        if (!embeddings) {
            return Promise.reject(new Error('No embedding model configured'));
        }

        if (!this.store) {
            const documents = this.articles.map(article => new Document({
                pageContent: `${article.title}\n${article.tags.join(', ')}\n${article.content}`,
                metadata: { id: article.id }
            }));
            this.store = MemoryVectorStore.fromDocuments(documents, embeddings);
            console.log('[KnowledgeBase] Indexing articles:', documents.length);
        }
        return this.store;
    }
}
