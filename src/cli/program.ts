import { Command } from "commander";
import { launchCommand } from "./commands/launch.js";

export type LaunchAction = typeof launchCommand;

export function createProgram(action: LaunchAction = launchCommand): Command {
    const program = new Command();

    program
        .name("mpd-launch")
        .description("Reset a private runtime directory, write mpd.conf into it and run mpd in the foreground")
        // -h/--help and -V/--version belong to the daemon
        .helpOption("--launcher-help", "Display help for mpd-launch")
        .argument("[daemon-args...]", "Arguments passed to the daemon after the config path")
        .option("--root <dir>", "Directory to create the .mpd runtime directory in (defaults to the launcher's own directory)")
        .option("--daemon <path>", "Daemon binary to run (defaults to the settings file, then 'mpd')")
        .option("--dry-run", "Prepare the runtime directory and print the daemon command instead of running it")
        .option("--print-socket", "Print the socket path the daemon binds to and exit")
        // Everything from the first unrecognised argument on belongs to the daemon
        .allowUnknownOption()
        .passThroughOptions()
        .action(action);

    return program;
}
