/**
 * Taxonomy Provider
 *
 * Loads the fixed category list once per run. The fallback label is always a
 * member, so any coerced `primary_category` is guaranteed to be valid.
 */

import { readFile } from 'fs/promises'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { TaxonomyError } from './errors'
import { logger } from './logger'

export const FALLBACK_CATEGORY = 'other'

export type Category = string

/** Category label → probability-like score, one entry per taxonomy label. */
export type ScoreVector = Record<Category, number>

export interface Taxonomy {
  /** Labels in configured order; never empty, never duplicated. */
  readonly categories: readonly Category[]
  readonly members: ReadonlySet<Category>
}

const TaxonomyFileSchema = z.object({
  categories: z.array(z.union([z.string(), z.number()])),
})

/**
 * Builds a taxonomy from raw labels: trims, drops blanks and duplicates
 * (first occurrence wins) and appends the fallback label if it is missing.
 *
 * @throws TaxonomyError if no labels remain
 */
export function createTaxonomy(labels: readonly (string | number)[]): Taxonomy {
  const categories: Category[] = []
  const seen = new Set<Category>()
  for (const raw of labels) {
    const label = String(raw).trim()
    if (!label || seen.has(label)) continue
    seen.add(label)
    categories.push(label)
  }

  if (categories.length === 0) {
    throw new TaxonomyError('No categories found in taxonomy')
  }

  if (!seen.has(FALLBACK_CATEGORY)) {
    logger.warn(`Taxonomy lacks "${FALLBACK_CATEGORY}"; appending it as the fallback category`)
    seen.add(FALLBACK_CATEGORY)
    categories.push(FALLBACK_CATEGORY)
  }

  return { categories, members: seen }
}

/**
 * Loads the taxonomy from a YAML file of the form `categories: [a, b, ...]`.
 *
 * @throws TaxonomyError if the file is missing, malformed or empty
 */
export async function loadTaxonomy(path: string): Promise<Taxonomy> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (err) {
    throw new TaxonomyError(`Taxonomy file not readable: ${path}`, {
      path,
      cause: err instanceof Error ? err.message : String(err),
    })
  }

  let data: unknown
  try {
    data = parseYaml(text)
  } catch (err) {
    throw new TaxonomyError(`Taxonomy file is not valid YAML: ${path}`, {
      path,
      cause: err instanceof Error ? err.message : String(err),
    })
  }

  const result = TaxonomyFileSchema.safeParse(data)
  if (!result.success) {
    throw new TaxonomyError(`Taxonomy file must contain a "categories" list: ${path}`, {
      path,
      issues: result.error.issues.map((i) => i.message),
    })
  }

  return createTaxonomy(result.data.categories)
}

/** Uniform distribution over the taxonomy: 1/|categories| each. */
export function uniformScores(taxonomy: Taxonomy): ScoreVector {
  const share = 1 / taxonomy.categories.length
  const scores: ScoreVector = {}
  for (const c of taxonomy.categories) scores[c] = share
  return scores
}
