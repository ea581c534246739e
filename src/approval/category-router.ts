/**
 * Category Router
 *
 * Maps an approval's category (the approval template name) to the mailbox that
 * receives its notifications. Routes come from a JSON file that names, for each
 * category, the environment variable holding the address:
 *
 *   { "routes": [{ "category": "费用报销", "addressEnv": "EMAIL_EXPENSE" }] }
 *
 * A category that is not listed, or whose variable is unset or empty, has no
 * destination; callers skip such approvals.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { CategoryMap } from './types.js';

export const CategoryRoutesFileSchema = z.object({
  routes: z.array(
    z.object({
      category: z.string().min(1),
      addressEnv: z.string().min(1),
    }),
  ),
});

export type CategoryRoutesFile = z.infer<typeof CategoryRoutesFileSchema>;

/**
 * Exact-match lookup. Returns undefined for unmapped categories and for
 * categories mapped to an empty address.
 */
export function routeCategory(map: CategoryMap, categoryName: string): string | undefined {
  const address = map.get(categoryName)?.trim();
  return address ? address : undefined;
}

/** Resolve each route's address from the environment */
export function buildCategoryMap(
  file: CategoryRoutesFile,
  env: NodeJS.ProcessEnv = process.env,
): CategoryMap {
  return new Map(file.routes.map(route => [route.category, env[route.addressEnv] ?? '']));
}

/**
 * Load and validate the routes file.
 *
 * @throws Error if the file is missing, not JSON, or does not match the schema
 */
export function loadCategoryMap(filePath: string, env: NodeJS.ProcessEnv = process.env): CategoryMap {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  const result = CategoryRoutesFileSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid category routes file ${filePath}: ${result.error.message}`);
  }

  const map = buildCategoryMap(result.data, env);
  const configured = [...map.values()].filter(Boolean).length;
  console.log('[config] Category routes loaded', { routes: map.size, configured });
  return map;
}
