import { defineCommand } from 'citty'
import * as p from '@clack/prompts'
import { loadUninstallOptions } from '../installers/config.js'
import { errorMessage } from '../installers/errors.js'
import { findRoot } from '../installers/paths.js'
import { runUninstaller } from '../uninstallers/main.js'

const repoRoot = findRoot()

export const uninstallCommand = defineCommand({
  meta: { name: 'uninstall', description: 'Remove everything the installer set up' },
  args: {
    yes: { type: 'boolean', description: 'Do not ask for confirmation' },
    'dry-run': { type: 'boolean', description: 'Print actions without making changes' },
    'keep-path': { type: 'boolean', description: 'Leave the ~/.local/bin PATH line in ~/.bashrc' }
  },
  async run({ args }) {
    const options = loadUninstallOptions(process.env, {
      yes: args.yes ? true : undefined,
      dryRun: args['dry-run'] || false,
      keepPath: args['keep-path'] || false
    })
    p.intro('golem-host · Uninstall')
    try {
      await runUninstaller(options, repoRoot)
      p.outro('Uninstall finished')
    } catch (error) {
      p.cancel(`Uninstall failed: ${errorMessage(error)}`)
      throw error
    }
  }
})
