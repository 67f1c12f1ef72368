/**
 * Small SQL fragments shared by the list queries
 */

import { sql, type RawBuilder, type SqlBool } from 'kysely';
import { buildLikePattern, LIKE_ESCAPE_CHAR } from '@storekeep/shared';

/**
 * Case-insensitive "contains" match: LOWER(column) LIKE '%term%' ESCAPE '\'
 * NULL columns never match.
 */
export function containsInsensitive(column: string, search: string): RawBuilder<SqlBool> {
    const pattern = buildLikePattern(search);
    return sql<SqlBool>`LOWER(${sql.ref(column)}) LIKE ${pattern} ESCAPE ${LIKE_ESCAPE_CHAR}`;
}

/** Direction for date-ordered lists: listings are newest first, exports oldest first */
export type DateSortDirection = 'asc' | 'desc';
