import { Provider, Logger, InternalServerErrorException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import nano from 'nano';
import type { CreateIndexRequest } from 'nano';
import { DATABASE_CONNECTION } from './database.constants';
import type { CouchDatabase, StoreDocument } from './couch';

// Mango indexes behind the batch and movement queries. CouchDB answers
// "exists" for ones already present, so this runs on every start.
const INDEXES: CreateIndexRequest[] = [
    { ddoc: 'batch-product-expiry', name: 'batch-product-expiry', index: { fields: ['type', 'productId', 'expiryDate'] } },
    { ddoc: 'batch-expiry', name: 'batch-expiry', index: { fields: ['type', 'expiryDate'] } },
    { ddoc: 'batch-checked', name: 'batch-checked', index: { fields: ['type', 'lastCheckedAt'] } },
    { ddoc: 'movement-occurred', name: 'movement-occurred', index: { fields: ['type', 'occurredAt'] } },
];

export const databaseProvider: Provider = {
    provide: DATABASE_CONNECTION,
    inject: [ConfigService],
    useFactory: async (configService: ConfigService): Promise<CouchDatabase> => {
        const url = configService.get<string>('COUCHDB_URL');
        const dbName = configService.get<string>('COUCHDB_DATABASE');
        if (!url || !dbName) {
            throw new Error('database.env_missing');
        }

        const logger = new Logger('DatabaseProvider');
        const server = nano(url);

        try {
            const existing = await server.db.list();
            if (!existing.includes(dbName)) {
                logger.log(`Creating partitioned database '${dbName}'`);
                await server.db.create(dbName, { partitioned: true });
            }

            const db = server.db.use<StoreDocument>(dbName);
            for (const index of INDEXES) {
                const res = await db.createIndex(index);
                if (res.result === 'created') logger.log(`Created index ${index.name}`);
            }
            return db;
        } catch (error) {
            logger.error(`Could not prepare database '${dbName}'`, error instanceof Error ? error.stack : String(error));
            throw new InternalServerErrorException({ key: 'database.connect_failed' });
        }
    },
};
