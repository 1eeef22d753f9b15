import type { UninstallerContext } from '../installers/types.js'
import { PATH_LINE } from '../installers/ensureShellPath.js'
import { removeLines } from '../installers/utils.js'

const MANAGED = /idle-finance|IDLE_FINANCE|GOLEM/

export function isManagedShellLine(line: string): boolean {
  return line.trim() === PATH_LINE || MANAGED.test(line)
}

export async function cleanupShellRc(ctx: UninstallerContext): Promise<number> {
  if (ctx.options.keepPath) {
    ctx.logger.info(`Keeping PATH entries in ${ctx.paths.shellRc}`)
    return 0
  }
  const removed = await removeLines(ctx, ctx.paths.shellRc, isManagedShellLine, { backup: true })
  ctx.logger.ok(removed > 0 ? `Removed ${removed} line(s) from ${ctx.paths.shellRc}` : `${ctx.paths.shellRc} already clean`)
  return removed
}
