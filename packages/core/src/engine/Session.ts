/**
 * KeelDB - Session
 *
 * Execution context for a caller: the database selected by USE. Each REPL,
 * CLI run or connection owns one; nothing about it is global.
 */

export class Session {
    private currentDatabase: string | null;

    constructor(database: string | null = null) {
        this.currentDatabase = database;
    }

    /**
     * Name of the selected database, or null before USE.
     */
    getDatabase(): string | null {
        return this.currentDatabase;
    }

    use(name: string): void {
        this.currentDatabase = name;
    }

    /**
     * Forget the selection, e.g. after the database is dropped.
     */
    clear(): void {
        this.currentDatabase = null;
    }
}
