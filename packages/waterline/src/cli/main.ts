import process from "node:process";
import { printHelp } from "./command/help-command.js";
import { runCommand } from "./command/run-command.js";
import { statusCommand } from "./command/status-command.js";

const VALID_COMMANDS = new Set(['run', 'status', 'help']);

function printBanner() {
    console.log("============================");
    console.log("waterline v 0.1.0");
    console.log("============================\n");
}

/**
 * Dispatches one CLI invocation. `status` prints nothing but its report,
 * so `status --json` output can be piped as is.
 */
export async function main(argv: string[] = process.argv.slice(2), cwd: string = process.cwd()) {
    const [command = 'help',...options] = argv;
    if(!VALID_COMMANDS.has(command)) {
      printBanner();
      console.log('[Message]: Invalid_command');
      printHelp();
      process.exitCode = 1;
      return;
    }
    switch(command) {
      case 'run':
        printBanner();
        await runCommand(options, cwd);
        break;
      case 'status':
        await statusCommand(options, cwd);
        break;
      default:
        printBanner();
        printHelp();
        break;
    }
}
