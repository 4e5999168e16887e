export const RedisDeps = {
  Client: Symbol.for('RedisClient'),
};
