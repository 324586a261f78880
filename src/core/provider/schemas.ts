import { z } from 'zod'

/**
 * Repository metadata; only the default branch is used
 */
export const RepositorySchema = z.object({
  default_branch: z.string().min(1, 'default_branch is required')
})

export type Repository = z.infer<typeof RepositorySchema>

/**
 * One entry of a recursive tree listing
 */
export const TreeEntrySchema = z.object({
  type: z.string().describe('blob, tree or commit (submodule)'),
  path: z.string()
})

export type TreeEntry = z.infer<typeof TreeEntrySchema>

/**
 * Recursive tree listing; `truncated` is set when the entry ceiling was hit
 */
export const TreeResponseSchema = z.object({
  tree: z.array(TreeEntrySchema),
  truncated: z.boolean().default(false)
})

export type TreeResponse = z.infer<typeof TreeResponseSchema>

/**
 * One entry of a directory contents listing
 */
export const ContentEntrySchema = z.object({
  type: z.string().describe('file, dir, symlink or submodule'),
  path: z.string()
})

export type ContentEntry = z.infer<typeof ContentEntrySchema>

/**
 * Directory contents listing
 *
 * Listing a path that is a file returns the single entry instead of an array.
 */
export const ContentsResponseSchema = z
  .union([z.array(ContentEntrySchema), ContentEntrySchema])
  .transform(value => (Array.isArray(value) ? value : [value]))

export type ContentsResponse = z.infer<typeof ContentsResponseSchema>
