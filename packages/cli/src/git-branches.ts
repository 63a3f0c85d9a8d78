import { simpleGit, GitError } from 'simple-git';
import { GitCommandError, getErrorMessage } from '@jira-branch-checker/shared';

/**
 * The slice of simple-git the branch lister needs
 */
export interface GitRunner {
  raw(args: string[]): Promise<string>;
}

export function createGit(repoPath: string = process.cwd()): GitRunner {
  try {
    return simpleGit({ baseDir: repoPath, binary: 'git' });
  } catch (error) {
    // simple-git throws synchronously when baseDir does not exist
    throw new GitCommandError(getErrorMessage(error), getErrorMessage(error), error instanceof Error ? error : undefined);
  }
}

/**
 * List local branches followed by remote-tracking branches.
 * The "* " current-branch marker is stripped and "origin/HEAD -> origin/main" style lines are dropped.
 */
export async function listBranches(git: GitRunner): Promise<string[]> {
  const local = splitLines(await runGit(git, ['branch']))
    .map((branch) => (branch.startsWith('* ') ? branch.slice(2) : branch));

  const remote = splitLines(await runGit(git, ['branch', '-r']))
    .filter((branch) => !branch.includes('->'));

  return [...local, ...remote];
}

async function runGit(git: GitRunner, args: string[]): Promise<string> {
  try {
    return await git.raw(args);
  } catch (error) {
    const stderr = error instanceof GitError ? error.message.trim() : getErrorMessage(error);
    throw new GitCommandError(
      `git ${args.join(' ')} failed`,
      stderr,
      error instanceof Error ? error : undefined
    );
  }
}

function splitLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
