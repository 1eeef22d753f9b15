import { defineCommand } from 'citty'
import * as p from '@clack/prompts'
import { loadOptions } from '../installers/config.js'
import { errorMessage } from '../installers/errors.js'
import { runInstaller } from '../installers/main.js'
import { findRoot } from '../installers/paths.js'

const repoRoot = findRoot()

export const installCommand = defineCommand({
  meta: {
    name: 'install',
    description: 'Provision this host for the Golem provider and the Idle Finance app'
  },
  args: {
    yes: { type: 'boolean', description: 'Auto-confirm every step (AUTO_CONFIRM)' },
    'dry-run': { type: 'boolean', description: 'Print actions without making changes' },
    interactive: { type: 'boolean', description: 'Run the provider installer fully interactively' },
    'node-name': { type: 'string', description: 'Provider node name (NODE_NAME)' },
    wallet: { type: 'string', description: 'Wallet address for scripted provider setup (WALLET_ADDRESS)' },
    format: { type: 'string', description: 'deb|appimage desktop app format (DESKTOP_APP_FORMAT)' },
    'app-version': { type: 'string', description: 'Desktop app version (DESKTOP_APP_VERSION)' },
    'skip-desktop-app': { type: 'boolean', description: 'Do not install the desktop app (INSTALL_DESKTOP_APP=0)' }
  },
  async run({ args }) {
    // Unset boolean flags leave the environment in charge.
    const options = loadOptions(process.env, {
      yes: args.yes ? true : undefined,
      dryRun: args['dry-run'] || false,
      interactive: args.interactive ? true : undefined,
      nodeName: args['node-name'],
      wallet: args.wallet,
      format: args.format,
      appVersion: args['app-version'],
      desktopApp: args['skip-desktop-app'] ? false : undefined
    })

    p.intro('golem-host · Install')
    try {
      await runInstaller(options, repoRoot)
      p.outro('Provisioning finished')
    } catch (error) {
      p.cancel(`Provisioning failed: ${errorMessage(error)}`)
      throw error
    }
  }
})
