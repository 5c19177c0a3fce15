import '../env.js'
import { loggers } from '../config/logger.js'
import { MaintainerError } from '../errors.js'
import { runDiscoverCommand } from './commands/discover.js'
import { runFixUrlsCommand } from './commands/fix-urls.js'
import { runImportCsvCommand } from './commands/import-csv.js'
import { runMaintainCommand } from './commands/maintain.js'
import { runValidateCommand } from './commands/validate.js'
import { asString, parseFlags, unknownFlags } from './parse-flags.js'
import type { Flags } from './parse-flags.js'

const COMMAND_FLAGS: Record<string, readonly string[]> = {
  maintain: ['skip-discovery', 'dry-run'],
  validate: [],
  discover: [],
  'import-csv': ['input'],
  'fix-urls': ['dry-run'],
}

function printHelp(): void {
  console.log('Certification dataset maintainer')
  console.log('')
  console.log('Commands:')
  console.log('  maintain [--skip-discovery] [--dry-run]')
  console.log('  validate')
  console.log('  discover')
  console.log('  import-csv [--input <path>]')
  console.log('  fix-urls [--dry-run]')
}

async function dispatch(command: string, flags: Flags): Promise<number> {
  switch (command) {
    case 'maintain':
      return runMaintainCommand({
        skipDiscovery: flags['skip-discovery'] === true,
        dryRun: flags['dry-run'] === true,
      })
    case 'validate':
      return runValidateCommand()
    case 'discover':
      return runDiscoverCommand()
    case 'import-csv':
      return runImportCsvCommand({ input: asString(flags.input) })
    case 'fix-urls':
      return runFixUrlsCommand({ dryRun: flags['dry-run'] === true })
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      return 2
  }
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  const allowed = COMMAND_FLAGS[command]
  if (allowed) {
    const unexpected = unknownFlags(flags, allowed)
    if (unexpected.length > 0) {
      console.error(`Unknown flag(s) for ${command}: ${unexpected.map(key => `--${key}`).join(', ')}`)
      printHelp()
      process.exit(2)
    }
  }

  process.exit(await dispatch(command, flags))
}

main().catch(error => {
  loggers.cli.fatal('Run failed', {}, error)
  process.exit(error instanceof MaintainerError ? error.exitCode : 1)
})
