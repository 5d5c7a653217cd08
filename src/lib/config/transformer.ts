import { logger } from '../logger';

export interface JsonRecord {
    [key: string]: unknown;
}

type OptionTransform = {
    name: string;
    run: (options: JsonRecord) => boolean;
};

// Option names as older snake_case inventories spell them
const LEGACY_KEYS: Record<string, string> = {
    candidate_cfg: 'candidateCfg',
    merge_cfg: 'mergeCfg',
    rollback_cfg: 'rollbackCfg',
    inline_transfer: 'inlineTransfer',
    dest_file_system: 'destFileSystem',
    auto_rollback_on_error: 'autoRollbackOnError',
    auto_file_prompt: 'autoFilePrompt',
    canonical_int: 'canonicalInt',
    strict_commands: 'strictCommands',
    global_delay_factor: 'globalDelayFactor',
    use_keys: 'useKeys',
    key_file: 'keyFile',
    ssh_strict: 'sshStrict',
    system_host_keys: 'systemHostKeys',
    alt_host_keys: 'altHostKeys',
    alt_key_file: 'altKeyFile',
    ssh_config_file: 'sshConfigFile',
    allow_agent: 'allowAgent',
};

const renameLegacyKeys: OptionTransform = {
    name: 'legacy-snake-case-keys',
    run: (options) => {
        let changed = false;
        for (const [legacy, current] of Object.entries(LEGACY_KEYS)) {
            if (!(legacy in options)) continue;
            // The camelCase spelling wins when both are present
            if (options[current] === undefined) {
                options[current] = options[legacy];
            }
            delete options[legacy];
            changed = true;
        }
        return changed;
    }
};

const numericStrings: OptionTransform = {
    name: 'numeric-strings',
    run: (options) => {
        let changed = false;
        for (const key of ['port', 'keepalive', 'globalDelayFactor']) {
            const value = options[key];
            if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) {
                options[key] = Number(value);
                changed = true;
            }
        }
        return changed;
    }
};

const transforms: OptionTransform[] = [renameLegacyKeys, numericStrings];

/**
 * Returns a copy of `raw` with every known legacy spelling rewritten.
 * The input is not modified.
 */
export function applyOptionTransforms(raw: JsonRecord): JsonRecord {
    const options: JsonRecord = { ...raw };
    for (const transform of transforms) {
        if (transform.run(options)) {
            logger.debug('Config', `Applied ${transform.name}`);
        }
    }
    return options;
}
