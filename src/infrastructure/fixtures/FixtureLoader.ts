import path from 'path';
import fs from 'fs/promises';

/**
 * Loads recorded upstream responses for TEST_MODE.
 */
export class FixtureLoader {
    constructor(private readonly fixturesDir: string) { }

    static defaultDirectory(): string {
        return path.resolve(process.cwd(), 'tests/fixtures/responses');
    }

    async load(fixtureName: string): Promise<unknown> {
        const fixturePath = path.join(this.fixturesDir, fixtureName);
        const content = await fs.readFile(fixturePath, 'utf-8');

        if (fixtureName.endsWith('.json')) {
            return JSON.parse(content);
        }
        return content;
    }
}
