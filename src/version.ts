export const NAME = 'ontoreason';
export const VERSION = '0.1.0';
