/**
 * Formatter Utilities
 */

/** `doc-1 p.3`, or `doc-1` when the page is unknown */
export function formatCitation(documentId: string | null, page: number | null | undefined): string {
  if (documentId === null) return 'no source';
  return page !== null && page !== undefined ? `${documentId} p.${page}` : documentId;
}
