import { defineCommand } from 'citty'
import { readFileSync } from 'fs'
import { join } from 'path'
import { installCommand } from './commands/install.js'
import { doctorCommand } from './commands/doctor.js'
import { uninstallCommand } from './commands/uninstall.js'
import { providerCommand } from './commands/provider.js'
import { findRoot } from './installers/paths.js'

const packageJson: unknown = JSON.parse(readFileSync(join(findRoot(), 'package.json'), 'utf-8'))
const version = typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
  ? String(packageJson.version)
  : '0.0.0'

export const root = defineCommand({
  meta: {
    name: 'golem-host',
    version,
    description: 'Provision a Linux host for the Golem provider and the Idle Finance app'
  },
  subCommands: {
    install: installCommand,
    uninstall: uninstallCommand,
    doctor: doctorCommand,
    provider: providerCommand
  }
})
