import type { CategoryDocumentResult, CategorySection } from '../../shared/types';
import { RemoteApiError } from '../errors';
import type { Logger } from '../obs/logger';
import { mapWithConcurrency } from '../utils/concurrency';
import type { DocsClient } from './client';
import { planCategoryDocument, verifyRequestPlan } from './plan';

export interface BuildCategoryDocumentsArgs {
  sections: readonly CategorySection[];
  client: DocsClient;
  logger: Logger;
  generatedAt: Date;
  /** Categories submitted at once; each category still owns its own cursor. */
  concurrency?: number;
}

/**
 * One category, one document, one batchUpdate. The service applies a batch as a unit
 * but a rejected batch after a successful create leaves an empty or partial document;
 * that is reported, not rolled back.
 */
export const buildCategoryDocument = async (
  section: CategorySection,
  { client, logger, generatedAt }: Omit<BuildCategoryDocumentsArgs, 'sections' | 'concurrency'>,
): Promise<CategoryDocumentResult> => {
  const { category, blocks } = section;
  if (blocks.length === 0) {
    logger.info('Skipping empty category', { category });
    return { category, status: 'skipped' };
  }

  const plan = planCategoryDocument({ category, blocks, generatedAt });
  verifyRequestPlan(plan.requests);

  let documentId: string | undefined;
  try {
    documentId = await client.createDocument(plan.title);
    logger.info('Created category document', { category, title: plan.title, documentId });
    await client.batchUpdate(documentId, plan.requests);
    logger.info('Appended content to category document', {
      category,
      documentId,
      requests: plan.requests.length,
      endIndex: plan.endIndex,
    });
    return { category, status: 'created', documentId, requestCount: plan.requests.length };
  } catch (error) {
    if (!(error instanceof RemoteApiError)) throw error;
    logger.error('Failed to build category document', {
      category,
      title: plan.title,
      documentId,
      status: error.status,
      error: error.message,
    });
    return { category, status: 'failed', documentId, error: error.message };
  }
};

export const buildCategoryDocuments = async ({
  sections,
  client,
  logger,
  generatedAt,
  concurrency = 1,
}: BuildCategoryDocumentsArgs): Promise<CategoryDocumentResult[]> => {
  if (sections.length === 0) {
    logger.warn('No categories found to create documents');
    return [];
  }
  return await mapWithConcurrency(sections, concurrency, (section) =>
    buildCategoryDocument(section, { client, logger, generatedAt }),
  );
};
