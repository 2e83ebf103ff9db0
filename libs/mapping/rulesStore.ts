import { logger } from '../logging/logger.js';
import { MappingRules, RawMappingRules, Translation } from './mappingRules.js';

/**
 * Holds the active MappingRules. `publish` compiles a whole new set and swaps
 * the reference only when every rule compiled; on error the previous set
 * stays active and the error is rethrown to the caller.
 */
export class MappingRulesStore {
    private current: MappingRules;
    private version = 0;

    constructor(initial: MappingRules = MappingRules.empty()) {
        this.current = initial;
    }

    get rules(): MappingRules {
        return this.current;
    }

    get generation(): number {
        return this.version;
    }

    publish(raw: RawMappingRules): MappingRules {
        let next: MappingRules;
        try {
            next = MappingRules.validate(raw);
        } catch (err) {
            logger.warn(
                { error: err instanceof Error ? err.message : String(err), generation: this.version },
                'Rejected mapping rule set, keeping previous rules'
            );
            throw err;
        }

        this.current = next;
        this.version += 1;
        logger.info({ domains: next.domains(), generation: this.version }, 'Mapping rule set published');
        return next;
    }

    translate(domain: string, method: string, path: string, query: string): Translation {
        return this.current.translate(domain, method, path, query);
    }
}
