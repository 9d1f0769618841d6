/**
 * ShellService - wraps external command execution for testability.
 */

import { Context, Data, Effect, Layer, Stream, pipe } from "effect"
import { Command, CommandExecutor } from "@effect/platform"

// =============================================================================
// Errors
// =============================================================================

export class ShellError extends Data.TaggedError("ShellError")<{
  readonly message: string
  readonly command: string
  readonly exitCode?: number
}> {}

// =============================================================================
// Types
// =============================================================================

export interface ShellResult {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

// =============================================================================
// Service interface
// =============================================================================

export interface ShellService {
  /** Runs `command` with `args` directly, no shell in between. */
  readonly exec: (command: string, args: readonly string[]) => Effect.Effect<ShellResult, ShellError>
}

export class ShellServiceTag extends Context.Tag("ShellService")<
  ShellServiceTag,
  ShellService
>() {}

/**
 * Fails with ShellError when the command exits non-zero.
 */
export const execOk = (
  shell: ShellService,
  command: string,
  args: readonly string[]
): Effect.Effect<string, ShellError> =>
  pipe(
    shell.exec(command, args),
    Effect.filterOrFail(
      (result) => result.exitCode === 0,
      (result) =>
        new ShellError({
          message: result.stderr.trim() || `exited with code ${result.exitCode}`,
          command: [command, ...args].join(" "),
          exitCode: result.exitCode,
        })
    ),
    Effect.map((result) => result.stdout)
  )

// =============================================================================
// Live implementation (uses @effect/platform Command)
// =============================================================================

const collect = <E>(stream: Stream.Stream<Uint8Array, E>) => pipe(stream, Stream.decodeText(), Stream.mkString)

export const ShellServiceLive = Layer.effect(
  ShellServiceTag,
  Effect.map(CommandExecutor.CommandExecutor, (executor) => ({
    exec: (command: string, args: readonly string[]) =>
      pipe(
        Command.start(Command.make(command, ...args)),
        Effect.flatMap((proc) =>
          Effect.all([collect(proc.stdout), collect(proc.stderr), proc.exitCode], { concurrency: "unbounded" })
        ),
        Effect.map(([stdout, stderr, exitCode]) => ({ stdout, stderr, exitCode })),
        Effect.scoped,
        Effect.provideService(CommandExecutor.CommandExecutor, executor),
        Effect.mapError(
          (e) =>
            new ShellError({
              message: `Command failed: ${e.message}`,
              command: [command, ...args].join(" "),
            })
        )
      ),
  }))
)
