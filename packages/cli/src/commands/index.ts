/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/tuneup.ts.
 */

import { program } from 'commander'
import { installCommand } from './install.js'
import { diffCommand } from './diff.js'
import { verifyCommand, verifyRuntimeCommand, verifyStaticCommand } from './verify.js'

program
  .name('tuneup')
  .description(
    'tuneup — declarative performance tuning for an Arch-based workstation.\n' +
    'Compares the system with a catalog of desired settings, applies the\n' +
    'difference with backups, and verifies the result.',
  )
  .version('0.1.0')
  .option('--home <dir>', 'State directory for logs, backups and markers (env: TUNEUP_HOME)')
  .option('--catalog <dir>', 'Catalog directory (env: TUNEUP_CATALOG)')

program.addCommand(installCommand, { isDefault: true })
program.addCommand(diffCommand)
program.addCommand(verifyCommand)
program.addCommand(verifyStaticCommand)
program.addCommand(verifyRuntimeCommand)

export { program }
