export type CacheKey = string & { __brand: 'CacheKey' };
export type Username = string & { __brand: 'Username' };

export const createCacheKey = (url: string): CacheKey => url as CacheKey;
export const createUsername = (value: string): Username => value.trim() as Username;
