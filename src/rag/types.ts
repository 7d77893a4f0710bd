export const CONTENT_TYPES = ["wiki", "youtube", "forum"] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];

export function isContentType(value: unknown): value is ContentType {
  return value === "wiki" || value === "youtube" || value === "forum";
}

export const KNOWLEDGE_COLUMNS = ["wiki", "wiki_desc", "youtube", "yt_desc", "forum", "forum_desc"] as const;

export type KnowledgeColumn = (typeof KNOWLEDGE_COLUMNS)[number];

/** One CSV row; empty cells are null. */
export type KnowledgeRow = Record<KnowledgeColumn, string | null>;

export interface KnowledgeEntry {
  url: string;
  description: string;
  title: string;
  content?: string;
}

export type ProcessedKnowledge = Record<ContentType, KnowledgeEntry[]>;

export interface ExtractedPage {
  title: string;
  content: string;
  url: string;
}

export interface CsvValidation {
  valid: boolean;
  errors: string[];
}

export interface ChunkMetadata {
  game: string;
  content_type: ContentType;
  url: string;
  title: string;
  description: string;
  chunk_index: number;
  total_chunks: number;
}

export interface KnowledgeHit {
  content: string;
  metadata: ChunkMetadata;
  distance: number;
  content_type: ContentType;
}

export type GameStats = Record<ContentType, number>;

/** Read side of the knowledge base, as used by chat and the tool layer. */
export interface KnowledgeSearch {
  searchKnowledge(game: string, query: string, contentTypes?: readonly ContentType[], limit?: number): Promise<KnowledgeHit[]>;
}

/** Source of processed knowledge for ingestion. */
export interface KnowledgeSource {
  processGameKnowledge(game: string): Promise<ProcessedKnowledge>;
}

export function emptyKnowledge(): ProcessedKnowledge {
  return { wiki: [], youtube: [], forum: [] };
}
