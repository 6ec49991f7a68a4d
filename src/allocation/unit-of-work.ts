import { InternalServerErrorException, Logger } from '@nestjs/common';
import { isConflict } from '../database/couch';
import { decreaseBatch, increaseBatch } from '../batches/batch.model';
import type { BatchDoc } from '../batches/batches.types';
import type { MovementDoc } from '../movements/movements.types';
import type { NewMovement } from '../movements/movements.service';
import type { BatchWriter, MovementWriter } from './allocation.types';

const COMPENSATION_ATTEMPTS = 3;

interface StagedBatch {
    before: BatchDoc;
    after: BatchDoc;
}

interface WrittenBatch {
    before: BatchDoc;
    saved: BatchDoc;
}

export interface CommitResult {
    batches: BatchDoc[];
    movements: MovementDoc[];
}

/**
 * Collects the batch writes and movement entries of one operation and commits
 * them together. CouchDB offers no multi-document transaction, so a failed
 * commit undoes what it already wrote: movements are destroyed and every saved
 * batch gets the moved quantity back through a compensating write. The
 * original error is rethrown once the store is back where it started.
 */
export class UnitOfWork {
    private readonly staged: StagedBatch[] = [];
    private readonly entries: NewMovement[] = [];

    constructor(
        private readonly tenantId: string,
        private readonly batches: BatchWriter,
        private readonly movements: MovementWriter,
        private readonly logger: Logger,
    ) { }

    updateBatch(before: BatchDoc, after: BatchDoc): this {
        this.staged.push({ before, after });
        return this;
    }

    appendMovement(entry: NewMovement): this {
        this.entries.push(entry);
        return this;
    }

    async commit(): Promise<CommitResult> {
        const written: WrittenBatch[] = [];
        const appended: MovementDoc[] = [];

        try {
            for (const { before, after } of this.staged) {
                const saved = await this.batches.save(after);
                written.push({ before, saved });
            }
            for (const entry of this.entries) {
                appended.push(await this.movements.append(this.tenantId, entry));
            }
        } catch (error) {
            await this.rollback(written, appended);
            throw error;
        }

        return { batches: written.map((w) => w.saved), movements: appended };
    }

    private async rollback(written: WrittenBatch[], appended: MovementDoc[]) {
        try {
            for (const movement of [...appended].reverse()) {
                await this.movements.revoke(movement);
            }
            for (const { before, saved } of [...written].reverse()) {
                await this.compensate(saved, before.quantity - saved.quantity);
            }
        } catch (error) {
            this.logger.error(
                `Rollback failed for tenant ${this.tenantId}; batch quantities may need manual repair`,
                error instanceof Error ? error.stack : String(error),
            );
            throw new InternalServerErrorException({ key: 'allocation.rollback_failed' });
        }
    }

    private async compensate(saved: BatchDoc, delta: number) {
        if (delta === 0) return;

        let current = saved;
        for (let attempt = 1; ; attempt++) {
            const restored = delta > 0 ? increaseBatch(current, delta) : decreaseBatch(current, -delta);
            try {
                await this.batches.save(restored);
                return;
            } catch (error) {
                if (!isConflict(error) || attempt >= COMPENSATION_ATTEMPTS) throw error;
                // Someone wrote the batch after us; reapply on top of their revision
                current = await this.batches.findOne(this.tenantId, saved.batchId);
            }
        }
    }
}
