#!/usr/bin/env tsx
/**
 * bin/tuneup.ts — entry point for the `tuneup` command.
 *
 * tuneup                  → install (interactive confirmations)
 * tuneup --all            → install, accepting every confirmation
 * tuneup diff             → show pending changes
 * tuneup verify           → check configured and running state
 */

import { program } from '../commands/index.js'

await program.parseAsync()
