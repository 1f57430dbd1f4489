// Keep test output clean: console methods stay silent unless LOG_LEVEL asks for them.
//   debug -> everything
//   info  -> info, warn, error
//   warn  -> warn, error
//   error -> error only
// Without LOG_LEVEL nothing is printed.

type ConsoleMethod = 'log' | 'info' | 'debug' | 'warn' | 'error'

const visibleMethods: Record<string, ConsoleMethod[]> = {
  debug: ['log', 'info', 'debug', 'warn', 'error'],
  info: ['info', 'warn', 'error'],
  warn: ['warn', 'error'],
  error: ['error'],
}

const visible = new Set(visibleMethods[process.env.LOG_LEVEL?.toLowerCase() ?? ''] ?? [])
const silenced: ConsoleMethod[] = ['log', 'info', 'debug', 'warn', 'error']

for (const method of silenced) {
  if (!visible.has(method)) {
    console[method] = () => {}
  }
}
