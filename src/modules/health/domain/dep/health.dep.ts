export const HealthDeps = {
  HealthRoute: Symbol.for('HealthRoute'),
};
