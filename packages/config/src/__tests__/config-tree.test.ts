import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfigTree, parseConfigTree } from '../config-tree.js';

describe('Config tree', () => {
	describe('parseConfigTree', () => {
		it('should parse sections of named blocks', () => {
			const result = parseConfigTree(
				JSON.stringify({
					Node: {
						primary: { Host: 'broker.local', Port: 1883, Insecure: true },
					},
				}),
			);

			expect(result.isOk()).toBe(true);
			expect(result._unsafeUnwrap()).toEqual({
				Node: { primary: { Host: 'broker.local', Port: 1883, Insecure: true } },
			});
		});

		it('should reject invalid JSON', () => {
			const result = parseConfigTree('{ "Node": ', 'broken.json');

			expect(result.isErr()).toBe(true);
			const error = result._unsafeUnwrapErr();
			expect(error.type).toBe('malformed');
			expect(error.path).toBe('broken.json');
		});

		it('should leave section and block contents to their consumers', () => {
			const tree = {
				Interval: 10,
				Node: { good: { Host: 'a' }, bad: { Host: 'b', Port: null } },
			};

			const result = parseConfigTree(JSON.stringify(tree));

			expect(result._unsafeUnwrap()).toEqual(tree);
		});

		it('should reject a document that is not an object', () => {
			const result = parseConfigTree('[{"Node":{}}]', 'list.json');

			const error = result._unsafeUnwrapErr();
			expect(error.type).toBe('malformed');
			expect(error.path).toBe('list.json');
			if (error.type === 'malformed') {
				expect(error.message).toMatch(/^<root>: /);
			}
		});
	});

	describe('loadConfigTree', () => {
		let dir: string;

		beforeAll(async () => {
			dir = await mkdtemp(join(tmpdir(), 'config-tree-'));
		});

		afterAll(async () => {
			await rm(dir, { recursive: true, force: true });
		});

		it('should load a file from disk', async () => {
			const path = join(dir, 'writer.json');
			await writeFile(path, JSON.stringify({ Node: { a: { Host: 'h' } } }));

			const result = await loadConfigTree(path);

			expect(result._unsafeUnwrap()).toEqual({ Node: { a: { Host: 'h' } } });
		});

		it('should report a missing file as unreadable', async () => {
			const result = await loadConfigTree(join(dir, 'missing.json'));

			expect(result.isErr()).toBe(true);
			expect(result._unsafeUnwrapErr().type).toBe('unreadable');
		});
	});
});
