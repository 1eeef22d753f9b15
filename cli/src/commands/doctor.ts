import { defineCommand } from 'citty'
import { loadOptions } from '../installers/config.js'
import { createContext } from '../installers/context.js'
import { findRoot } from '../installers/paths.js'
import { printStatus } from '../installers/verify.js'

const repoRoot = findRoot()

export const doctorCommand = defineCommand({
  meta: { name: 'doctor', description: 'Report host state without changing anything' },
  async run() {
    const options = { ...loadOptions(process.env), dryRun: true }
    const ctx = createContext({ command: 'doctor', options, rootDir: repoRoot })
    const rows = await printStatus(ctx)
    if (rows.some((r) => !r.ok)) process.exitCode = 1
  }
})
