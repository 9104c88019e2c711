import { NotFoundError } from './errors';
import { parseFloat64, parseInt32 } from './numbers';
import { parseStorageValue } from './storageValue';
import { LoadWindow, Resource, StorageValue } from './types';

/**
 * Typed access to the flat, string-valued resource list reported per queue.
 * Lookups scan linearly and the first resource with a matching name wins.
 */
export class ResourceList implements Iterable<Resource> {
    private readonly resources: Resource[];

    constructor(resources: Iterable<Resource> = []) {
        this.resources = [...resources];
    }

    get length(): number { return this.resources.length; }

    [Symbol.iterator](): Iterator<Resource> { return this.resources[Symbol.iterator](); }

    find(key: string): Resource {
        const resource = this.resources.find(r => r.name === key);
        if (!resource) throw new NotFoundError(key);
        return resource;
    }

    has(key: string): boolean {
        return this.resources.some(r => r.name === key);
    }

    getFloat(key: string): number {
        return parseFloat64(this.find(key).value);
    }

    getInteger(key: string): number {
        return parseInt32(this.find(key).value);
    }

    getStorageValue(key: string): StorageValue {
        return parseStorageValue(this.find(key).value);
    }

    /** load_short, load_medium or load_long */
    load(window: LoadWindow): number { return this.getFloat(`load_${window}`); }

    numberOfProcessors(): number { return this.getInteger('num_proc'); }

    freeMemory(): StorageValue { return this.getStorageValue('mem_free'); }
    freeSwap(): StorageValue { return this.getStorageValue('swap_free'); }
    freeVirtualMemory(): StorageValue { return this.getStorageValue('virtual_free'); }
    totalMemory(): StorageValue { return this.getStorageValue('mem_total'); }
    totalSwap(): StorageValue { return this.getStorageValue('swap_total'); }
    totalVirtual(): StorageValue { return this.getStorageValue('virtual_total'); }
    memoryUsed(): StorageValue { return this.getStorageValue('mem_used'); }
    swapUsed(): StorageValue { return this.getStorageValue('swap_used'); }

    toJSON(): Resource[] { return this.resources.map(r => ({ ...r })); }
}
