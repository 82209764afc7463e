/**
 * Git plumbing for the export pipeline: change detection, commit, push.
 */

import { execFileSync } from 'node:child_process'
import { ExternalCallError, toError } from './errors.js'

export interface GitClient {
  /** Paths under `pathspec` with uncommitted changes (including untracked files) */
  changedFiles(pathspec: string): string[]
  /** Stage `paths` and commit them. Returns false when there was nothing to commit. */
  commit(message: string, paths: string[]): boolean
  push(remote: string): void
  /** Put `pathspec` back to its committed state, dropping untracked files */
  restore(pathspec: string): void
}

/**
 * GitClient backed by the git executable in `cwd`
 */
export function createGitClient(cwd: string): GitClient {
  const git = (args: string[]): string => {
    try {
      // execFileSync avoids shell interpretation of paths and messages
      return execFileSync('git', args, {
        cwd,
        encoding: 'utf8',
        stdio: ['pipe', 'pipe', 'pipe']
      })
    } catch (err) {
      const error = toError(err)
      throw new ExternalCallError(`git ${args[0]}`, error.message, { cause: error })
    }
  }

  return {
    changedFiles(pathspec) {
      return parsePorcelainStatus(git(['status', '--porcelain', '--untracked-files=all', '--', pathspec]))
    },

    commit(message, paths) {
      if (paths.length === 0) {
        return false
      }
      git(['add', '--all', '--', ...paths])
      const staged = git(['diff', '--cached', '--name-only', '--', ...paths]).trim()
      if (!staged) {
        return false
      }
      git(['commit', '-m', message, '--', ...paths])
      return true
    },

    push(remote) {
      git(['push', remote, 'HEAD'])
    },

    restore(pathspec) {
      // checkout rejects a pathspec with no tracked files (a first export)
      if (git(['ls-files', '--', pathspec]).trim()) {
        git(['checkout', 'HEAD', '--', pathspec])
      }
      git(['clean', '-fd', '--', pathspec])
    }
  }
}

/**
 * Extract file paths from `git status --porcelain` output.
 * Renames ("R  old -> new") report the new path.
 */
export function parsePorcelainStatus(output: string): string[] {
  return output
    .split(/\r?\n/)
    .filter(line => line.length > 3)
    .map(line => {
      const entry = line.slice(3)
      const arrow = entry.indexOf(' -> ')
      const file = arrow === -1 ? entry : entry.slice(arrow + 4)
      return file.replace(/^"(.*)"$/, '$1')
    })
}
