/**
 * A remote directory: repository coordinates plus a ref and a path inside it.
 *
 * `dir` never starts or ends with `/`; an empty `dir` is the repository root.
 * The listing step may move leading `dir` segments onto `ref` while it works
 * out where a slash-containing branch name ends.
 */
export interface RepoLocator {
  /** Account or organisation that owns the repository */
  owner: string

  /** Repository name, without a `.git` suffix */
  repo: string

  /** Branch, tag or commit. Absent means the default branch */
  ref?: string

  /** Directory inside the repository */
  dir: string
}
