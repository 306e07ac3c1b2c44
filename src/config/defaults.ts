export const CLI_NAME = 'kryten';

export const CLI_VERSION = '2.0.0';

/** Relative to the working directory. */
export const DEFAULT_CONFIG_PATH = 'config.json';

/** Environment variable that supplies the config path when --config is absent. */
export const CONFIG_PATH_ENV = 'KRYTEN_CONFIG';

export const DEFAULT_DOMAIN = 'cytu.be';

/** Subject root the bridge subscribes to for outbound commands. */
export const COMMAND_SUBJECT_PREFIX = 'cytube.commands';

/** Connection name reported to the NATS server. */
export const CLIENT_NAME = `${CLI_NAME}-cli`;

/**
 * Full version string for --version output.
 * Example: kryten/2.0.0 linux-x64 node-v20.11.0
 */
export const VERSION_STRING =
  `${CLI_NAME}/${CLI_VERSION} ${process.platform}-${process.arch} node-${process.version}`;
