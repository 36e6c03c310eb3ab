import pino, { type Logger } from 'pino'

export interface Config {
    logger: Logger
}

const defaultConfig = (): Config => ({
    logger: pino({ name: 'exact-rational', level: 'silent' }),
})

let config: Config = defaultConfig()

export function configure(overrides: Partial<Config>): Config {
    config = { ...config, ...overrides }
    return config
}

export function getConfig(): Config {
    return config
}

export function resetConfig(): Config {
    config = defaultConfig()
    return config
}
