/** The launcher step a failure happened in */
export type LaunchStep = "settings" | "reset" | "write" | "spawn";

/**
 * A launcher failure. The underlying error is kept as `cause` and its
 * message is reused, so what the operating system reported is what the
 * user sees.
 */
export class LaunchError extends Error {
    readonly step: LaunchStep;
    /** errno code of the underlying error, e.g. "ENOENT" */
    readonly code: string | undefined;

    constructor(step: LaunchStep, cause: unknown) {
        super(cause instanceof Error ? cause.message : String(cause), { cause });
        this.name = "LaunchError";
        this.step = step;
        this.code = errnoCode(cause);
    }

    /**
     * Exit status for this failure. Spawn failures use the statuses a POSIX
     * shell reports for a command it cannot run.
     */
    get exitCode(): number {
        if (this.step === "spawn") {
            if (this.code === "ENOENT") return 127;
            if (this.code === "EACCES") return 126;
        }
        return 1;
    }
}

function errnoCode(err: unknown): string | undefined {
    if (err instanceof Error && "code" in err && typeof err.code === "string") {
        return err.code;
    }
    return undefined;
}
