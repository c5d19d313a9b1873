export type { PendingIdentity, ResolutionStrategy, StrategyContext } from './types';
export { SecureSlot } from './support';
export { LocalOnlyStrategy } from './LocalOnlyStrategy';
export { CloudKeychainStrategy } from './CloudKeychainStrategy';
export { HardwareIdStrategy } from './HardwareIdStrategy';
