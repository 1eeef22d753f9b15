import * as path from 'path'
import type { HostContext } from './types.js'
import { appendMissingLines } from './utils.js'

export const PATH_LINE = 'export PATH="$HOME/.local/bin:$PATH"'

/** Puts ~/.local/bin (where the provider installer drops its binaries) on PATH. */
export async function ensureShellPath(ctx: HostContext): Promise<boolean> {
  const added = await appendMissingLines(ctx, ctx.paths.shellRc, [PATH_LINE])
  if (added.length > 0) ctx.logger.ok(`Added ~/.local/bin to PATH in ${ctx.paths.shellRc}`)
  else ctx.logger.ok(`~/.local/bin already on PATH in ${ctx.paths.shellRc}`)

  // The post-install check runs in this process, which never re-reads the rc file.
  const entries = (process.env.PATH ?? '').split(path.delimiter)
  if (!ctx.options.dryRun && !entries.includes(ctx.paths.localBin)) {
    process.env.PATH = [ctx.paths.localBin, ...entries.filter(Boolean)].join(path.delimiter)
  }
  return added.length > 0
}
