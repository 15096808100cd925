export * from './gateway-identity.verifier';
export * from './trusted-gateway.guard';
