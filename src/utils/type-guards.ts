/**
 * Exhaustiveness check for switches over a union.
 *
 * @example
 * switch (state.step) {
 *   case 'idle': return <IdleMenu />
 *   case 'exited': return null
 *   default: return assertNever(state.step)
 * }
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled union member: ${JSON.stringify(value)}`)
}
