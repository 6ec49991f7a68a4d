import { Injectable, Inject, ConflictException, NotFoundException, BadRequestException, InternalServerErrorException, HttpException, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { DATABASE_CONNECTION } from '../database/database.constants';
import { type CouchDatabase, type StoreDocument, docId, findAllDocs, isNotFound, isProductDoc } from '../database/couch';
import { CreateProductDto } from './dto/create-product.dto';
import { UpdateProductDto } from './dto/update-product.dto';
import { ProductDoc, ProductStatus } from './products.types';

@Injectable()
export class ProductsService {
    private readonly logger = new Logger(ProductsService.name);

    constructor(
        @Inject(DATABASE_CONNECTION) private readonly db: CouchDatabase,
    ) { }

    async create(tenantId: string, createProductDto: CreateProductDto): Promise<ProductDoc> {
        try {
            // Barcodes are unique within the tenant
            const existing = await this.db.partitionedFind(tenantId, {
                selector: { type: 'product', barcode: createProductDto.barcode },
                limit: 1,
            });
            if (existing.docs.length > 0) {
                throw new ConflictException({ key: 'product.barcode_exists', vars: { barcode: createProductDto.barcode } });
            }

            const now = new Date().toISOString();
            const productId = uuidv4();
            const newProduct: ProductDoc = {
                _id: `${tenantId}:product:${productId}`,
                type: 'product',
                tenantId,
                productId,
                name: createProductDto.name,
                price: createProductDto.price,
                barcode: createProductDto.barcode,
                unitsPerPackage: createProductDto.unitsPerPackage,
                status: ProductStatus.ACTIVE,
                createdAt: now,
                updatedAt: now,
            };

            const response = await this.db.insert(newProduct);
            return { ...newProduct, _rev: response.rev };
        } catch (error) {
            if (error instanceof HttpException) throw error;
            this.logger.error('Failed to create product', error);
            throw new InternalServerErrorException({ key: 'product.create_failed' });
        }
    }

    async findOne(tenantId: string, id: string): Promise<ProductDoc> {
        let doc: StoreDocument;
        try {
            doc = await this.db.get(docId(tenantId, 'product', id));
        } catch (error) {
            if (isNotFound(error)) {
                throw new NotFoundException({ key: 'product.not_found', vars: { id } });
            }
            this.logger.error('Failed to load product', error);
            throw new InternalServerErrorException({ key: 'product.query_failed' });
        }
        if (!isProductDoc(doc)) {
            throw new NotFoundException({ key: 'product.not_found', vars: { id } });
        }
        return doc;
    }

    async findByBarcode(tenantId: string, barcode: string): Promise<ProductDoc> {
        let docs: StoreDocument[];
        try {
            const result = await this.db.partitionedFind(tenantId, {
                selector: { type: 'product', barcode },
                limit: 1,
            });
            docs = result.docs;
        } catch (error) {
            this.logger.error('Failed to find product by barcode', error);
            throw new InternalServerErrorException({ key: 'product.query_failed' });
        }

        const found = docs.find(isProductDoc);
        if (!found) {
            throw new NotFoundException({ key: 'product.barcode_not_found', vars: { barcode } });
        }
        return found;
    }

    async findAll(tenantId: string, status?: ProductStatus): Promise<ProductDoc[]> {
        try {
            const docs = await findAllDocs(this.db, tenantId, status ? { type: 'product', status } : { type: 'product' });
            return docs.filter(isProductDoc).sort((a, b) => a.name.localeCompare(b.name));
        } catch (error) {
            this.logger.error('Failed to list products', error);
            throw new InternalServerErrorException({ key: 'product.list_failed' });
        }
    }

    /**
     * Looks up several products at once; unknown ids are simply absent from the map.
     */
    async findMany(tenantId: string, ids: string[]): Promise<Map<string, ProductDoc>> {
        const byId = new Map<string, ProductDoc>();
        if (ids.length === 0) return byId;

        try {
            const docs = await findAllDocs(this.db, tenantId, {
                type: 'product',
                _id: { $in: [...new Set(ids)] },
            });
            for (const doc of docs.filter(isProductDoc)) {
                byId.set(doc._id, doc);
            }
            return byId;
        } catch (error) {
            this.logger.error('Failed to load products', error);
            throw new InternalServerErrorException({ key: 'product.query_failed' });
        }
    }

    async update(tenantId: string, id: string, updateDto: UpdateProductDto): Promise<ProductDoc> {
        const existing = await this.findOne(tenantId, id);
        return this.save({
            ...existing,
            name: updateDto.name ?? existing.name,
            price: updateDto.price ?? existing.price,
            unitsPerPackage: updateDto.unitsPerPackage ?? existing.unitsPerPackage,
        });
    }

    discontinue(tenantId: string, id: string) {
        return this.changeStatus(tenantId, id, ProductStatus.DISCONTINUED);
    }

    activate(tenantId: string, id: string) {
        return this.changeStatus(tenantId, id, ProductStatus.ACTIVE);
    }

    pause(tenantId: string, id: string) {
        return this.changeStatus(tenantId, id, ProductStatus.PAUSED);
    }

    private async changeStatus(tenantId: string, id: string, status: ProductStatus): Promise<ProductDoc> {
        const existing = await this.findOne(tenantId, id);
        if (existing.status === status) return existing;
        return this.save({ ...existing, status });
    }

    private async save(product: ProductDoc): Promise<ProductDoc> {
        const updated = { ...product, updatedAt: new Date().toISOString() };
        try {
            const res = await this.db.insert(updated);
            return { ...updated, _rev: res.rev };
        } catch (error) {
            this.logger.error('Failed to update product', error);
            throw new InternalServerErrorException({ key: 'product.update_failed' });
        }
    }
}
