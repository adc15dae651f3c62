import { Command, CommandRegistry as ICommandRegistry } from './types'

export class CommandRegistry implements ICommandRegistry {
  private commands: Map<string, Command> = new Map()

  register(command: Command): void {
    const names = [command.name, ...(command.aliases ?? [])]
    for (const name of names) {
      const existing = this.commands.get(name.toLowerCase())
      if (existing && existing.name !== command.name) {
        throw new Error(`Command name "${name}" is already taken by "${existing.name}"`)
      }
      this.commands.set(name.toLowerCase(), command)
    }
  }

  get(name: string): Command | undefined {
    return this.commands.get(name.toLowerCase())
  }

  getAll(): Command[] {
    // Aliases point at the same command object
    return Array.from(new Set(this.commands.values()))
  }

  usage(): string {
    const width = Math.max(...this.getAll().map((command) => command.name.length))
    return this.getAll()
      .map((command) => `  ${command.name.padEnd(width)}  ${command.description}`)
      .join('\n')
  }

  static createWithDefaults(commands: Command[]): CommandRegistry {
    const registry = new CommandRegistry()
    for (const command of commands) {
      registry.register(command)
    }
    return registry
  }
}
