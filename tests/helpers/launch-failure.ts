import { LaunchError } from "../../src/daemon/errors.js";

/** Await a promise that should reject with a LaunchError and return it */
export async function launchFailure(promise: Promise<unknown>): Promise<LaunchError> {
    const err = await promise.then(
        () => undefined,
        (e: unknown) => e,
    );
    if (!(err instanceof LaunchError)) {
        throw new Error(`expected a LaunchError, got ${String(err)}`);
    }
    return err;
}
