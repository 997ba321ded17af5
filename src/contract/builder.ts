/**
 * Fluent builder for step options.
 *
 *   new CommandBuilder()
 *       .addOption('--model', 'large-v3')
 *       .addOption('--preset', undefined)   // skipped
 *       .addFlag('--restore', restore)
 *       .build();                          // ['--model', 'large-v3', '--restore']
 */
export class CommandBuilder {
    private readonly tokens: string[] = [];

    addOption(flag: string, value: string | number | undefined | null): this {
        if (value !== undefined && value !== null) {
            this.tokens.push(flag, String(value));
        }
        return this;
    }

    addFlag(flag: string, enabled = true): this {
        if (enabled) {
            this.tokens.push(flag);
        }
        return this;
    }

    /** camelCase keys become --kebab-case flags; undefined values are skipped. */
    addOptions(options: Record<string, string | number | undefined>): this {
        for (const [key, value] of Object.entries(options)) {
            const flag = `--${key.replace(/[A-Z]/g, letter => `-${letter.toLowerCase()}`)}`;
            this.addOption(flag, value);
        }
        return this;
    }

    build(): string[] {
        return [...this.tokens];
    }
}
