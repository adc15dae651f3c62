export * from './types'
export { CommandRegistry } from './CommandRegistry'
export { CleanCommand } from './CleanCommand'
export { RecoverCommand } from './RecoverCommand'
export { ListBackupsCommand } from './ListBackupsCommand'

import { CleanCommand } from './CleanCommand'
import { RecoverCommand } from './RecoverCommand'
import { ListBackupsCommand } from './ListBackupsCommand'

export const defaultCommands = [
  CleanCommand,
  RecoverCommand,
  ListBackupsCommand,
]
