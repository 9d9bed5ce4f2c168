/**
 * Effect platform layers used by the file reader and writer
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Layer } from "effect";
import { CompressionService } from "../compression/service";

/**
 * Node platform services (FileSystem, Path) plus the live compression codecs
 */
export const IoLayer = Layer.merge(NodeContext.layer, CompressionService.Live);

export type IoServices = Layer.Layer.Success<typeof IoLayer>;

/**
 * Run an I/O program and rethrow the error it failed with
 *
 * `Effect.runPromise` rejects with a fiber-failure wrapper; callers of this
 * library match on the error classes instead, so the cause is squashed.
 */
export async function runIo<A, E>(program: Effect.Effect<A, E, IoServices>): Promise<A> {
  const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(IoLayer)));
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
