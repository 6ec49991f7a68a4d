export const DATABASE_CONNECTION = 'DATABASE_CONNECTION';
