import type { PortValue } from '@/marshal/json-value';

/**
 * Key-value store shared by the nodes of one tree ("blackboard").
 * Subtrees get a child blackboard; a remapped key reads and writes
 * through to the parent under the external name.
 */
export class Blackboard {
    private readonly entries = new Map<string, PortValue>();
    private readonly remapping = new Map<string, string>();

    constructor(private readonly parent: Blackboard | null = null) {}

    /** Create a blackboard for a subtree of this one */
    public createChild(): Blackboard {
        return new Blackboard(this);
    }

    /** Route `internalKey` of this blackboard to `externalKey` of the parent */
    public addSubtreeRemapping(internalKey: string, externalKey: string): void {
        this.remapping.set(internalKey, externalKey);
    }

    public get(key: string): PortValue | undefined {
        const external = this.remapping.get(key);
        if (external !== undefined && this.parent) {
            return this.parent.get(external);
        }
        return this.entries.get(key);
    }

    public has(key: string): boolean {
        return this.get(key) !== undefined;
    }

    public set(key: string, value: PortValue): void {
        const external = this.remapping.get(key);
        if (external !== undefined && this.parent) {
            this.parent.set(external, value);
            return;
        }
        this.entries.set(key, value);
    }

    /** Keys stored directly in this blackboard (remapped keys excluded) */
    public keys(): string[] {
        return [...this.entries.keys()];
    }

    public clear(): void {
        this.entries.clear();
    }
}
