import { v4 as uuidv4 } from 'uuid';

/**
 * Provenance of a call or event: the object that raised it and its name.
 * Only consulted for split-horizon checks when broadcasting.
 */
export class Metadata {
    public readonly id: string = uuidv4();
    public readonly createdAt: number = Date.now();

    constructor(
        public readonly sourceObj: unknown,
        public readonly sourceName: string,
    ) { }

    /**
     * True when `candidate` is the object this call originated from.
     */
    public isFrom(candidate: unknown): boolean {
        return this.sourceObj !== undefined && this.sourceObj === candidate;
    }
}
