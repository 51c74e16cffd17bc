/** Version of the running engine, checked against suite `engineVersion` ranges */
export const ENGINE_VERSION = '0.1.0'
