import { run, UsageError, USAGE } from './cli';

try {
    process.exitCode = run(process.argv.slice(2));
} catch (error) {
    if (error instanceof UsageError) {
        console.error(`${error.message}\n\n${USAGE}`);
        process.exitCode = 2;
    } else {
        console.error(error);
        process.exitCode = 1;
    }
}
