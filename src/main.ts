import { main } from '@/shopfloor';
import { isSubcommand, runSubcommandCLI } from '@/cli';

// `name` and `job` subcommands have their own program; everything else is the organizer
if (isSubcommand()) {
    runSubcommandCLI().catch((error: unknown) => {
        process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
        process.exit(1);
    });
} else {
    main().catch((error: unknown) => {
        process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
        process.exit(1);
    });
}
