export type StageName =
  | 'discovery'
  | 'dedup'
  | 'extraction'
  | 'normalization'
  | 'localRender'
  | 'delivery'
  | 'remoteDocs';

export type StageStatus = 'start' | 'progress' | 'success' | 'failure';

export interface StageEvent<T = unknown> {
  runId: string;
  stage: StageName;
  status: StageStatus;
  message?: string;
  data?: T;
  ts: string;
}

export type BlockKind = 'heading' | 'paragraph' | 'subHeading' | 'subSubHeading' | 'bulletItem' | 'numberedItem';

export type BlockLanguage = 'translated' | 'original';

interface BlockBase {
  text: string;
  language: BlockLanguage;
}

export interface HeadingBlock extends BlockBase {
  kind: 'heading';
  /** Featured image URL; only ever set on an article's translated heading. */
  imageRef?: string;
}

export interface NumberedItemBlock extends BlockBase {
  kind: 'numberedItem';
  ordinal: number;
}

export interface TextBlock extends BlockBase {
  kind: 'paragraph' | 'subHeading' | 'subSubHeading' | 'bulletItem';
}

export type ContentBlock = HeadingBlock | NumberedItemBlock | TextBlock;

/**
 * Language-neutral block as it comes off the page, before translation pairing.
 */
export type RawBlock =
  | { kind: 'heading'; text: string; imageRef?: string }
  | { kind: 'numberedItem'; text: string; ordinal: number }
  | { kind: TextBlock['kind']; text: string };

export interface Article {
  id: string;
  url: string;
  category: string | null;
  /** Original-language heading, used in the delivery caption. */
  title: string;
  blocks: ContentBlock[];
}

export interface CategorySection {
  category: string;
  blocks: ContentBlock[];
}

export type RunStatus = 'completed' | 'nothing_new';

export interface CategoryDocumentResult {
  category: string;
  status: 'created' | 'skipped' | 'failed';
  documentId?: string;
  requestCount?: number;
  error?: string;
}

export interface RunSummary {
  runId: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  discoveredUrls: number;
  newUrls: number;
  articles: Array<{ id: string; url: string; category: string | null; blockCount: number }>;
  skippedUrls: Array<{ url: string; reason: string }>;
  categories: string[];
  artifactFilename?: string;
  documents: CategoryDocumentResult[];
}
