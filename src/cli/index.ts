#!/usr/bin/env node
import { Command } from 'commander'
import { registerRunCommand } from './commands/run'
import { registerShowKeyCommand } from './commands/show-key'

const program = new Command()

program
  .name('cost-guardian')
  .description(
    'cdk-cost-guardian CLI -- run the guardian locally and inspect stored access keys',
  )
  .version('0.1.0')

registerRunCommand(program)
registerShowKeyCommand(program)

program.parseAsync().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : e)
  process.exit(1)
})
