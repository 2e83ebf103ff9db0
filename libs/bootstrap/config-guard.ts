import { logger } from '../logging/logger.js';

export type Env = Readonly<Record<string, string | undefined>>;

export type GuardRule =
    | { type: 'required'; name: string }
    | { type: 'forbidIf'; name: string; when: (env: Env) => boolean; message: string }
    | { type: 'assert'; check: (env: Env) => boolean; message: string };

export class ConfigError extends Error {
    readonly violations: readonly string[];

    constructor(violations: string[]) {
        super(violations.join('; '));
        this.name = 'ConfigError';
        this.violations = violations;
        Object.setPrototypeOf(this, ConfigError.prototype);
    }
}

function violationOf(rule: GuardRule, env: Env): string | undefined {
    switch (rule.type) {
        case 'required': {
            const value = env[rule.name];
            return !value || value.trim() === ''
                ? `FATAL CONFIG: Required env var ${rule.name} is missing`
                : undefined;
        }
        case 'forbidIf':
            return rule.when(env) ? `FATAL CONFIG: ${rule.message} (Rule: ${rule.name})` : undefined;
        case 'assert':
            return rule.check(env) ? undefined : `FATAL CONFIG: ${rule.message}`;
    }
}

/**
 * Fail-closed configuration guard. Every rule is evaluated against `env`;
 * all violations are logged together and raised as one ConfigError.
 */
export class ConfigGuard {
    static enforce(rules: readonly GuardRule[], env: Env = process.env): void {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                const violation = violationOf(rule, env);
                if (violation) errors.push(violation);
            } catch (err) {
                errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: "Check environment variables."
            }, "Configuration Guard Violation");

            throw new ConfigError(errors);
        }

        logger.info({ rules: rules.length }, "Configuration guard passed.");
    }
}
