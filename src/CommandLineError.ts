/** Invalid command-line input; the entry point prints usage and exits with status 2. */
export class CommandLineError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "CommandLineError";
    }
}
