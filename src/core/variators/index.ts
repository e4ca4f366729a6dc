export type { Variator } from './types'
export { IdentityVariator } from './identity-variator'
export { SwapVariator } from './swap-variator'
