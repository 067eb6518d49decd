/** Distance a secondary ray's origin is pushed off the surface */
export const ORIGIN_BIAS = 1e-4

/** castRay returns the environment color once depth exceeds this */
export const MAX_RAY_DEPTH = 3
