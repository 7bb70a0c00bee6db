/**
 * Final category path formatting: "Chladenie/Vitríny" becomes
 * "Tovary a kategórie > Chladenie > Vitríny".
 */

export interface CategoryPathOptions {
  /** Hierarchy separator used by feeds and mappings */
  separator: string;
  /** Separator used in the output path */
  delimiter: string;
  /** Namespace prepended to every path; '' for none */
  prefix: string;
}

export const DEFAULT_CATEGORY_PATH: CategoryPathOptions = {
  separator: '/',
  delimiter: ' > ',
  prefix: 'Tovary a kategórie',
};

export function formatCategoryPath(
  category: string,
  options: CategoryPathOptions = DEFAULT_CATEGORY_PATH
): string {
  const trimmed = category.trim();
  if (!trimmed) return '';

  const head = options.prefix ? `${options.prefix}${options.delimiter}` : '';
  if (options.prefix && (trimmed === options.prefix || trimmed.startsWith(head))) {
    return trimmed;
  }

  const segments = trimmed
    .split(options.separator)
    .map(segment => segment.trim())
    .filter(Boolean);

  return head + segments.join(options.delimiter);
}
