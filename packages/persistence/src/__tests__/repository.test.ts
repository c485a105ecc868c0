import { describe, it, expect } from 'vitest';
import { createPagedResult } from '../repository.js';

describe('Repository', () => {
	describe('createPagedResult', () => {
		it('should create paged result with correct metadata', () => {
			const items = [
				{ id: 1, email: 'test1@email.com' },
				{ id: 2, email: 'test2@email.com' },
			];
			const result = createPagedResult(items, 0, 2, 5);

			expect(result).toEqual({
				items,
				page: 0,
				pageSize: 2,
				totalItems: 5,
				totalPages: 3,
				hasNext: true,
				hasPrevious: false,
			});
		});

		it('should indicate neighbours for middle and last pages', () => {
			const middle = createPagedResult([{ id: 3 }], 1, 1, 3);
			const last = createPagedResult([{ id: 3 }], 2, 1, 3);

			expect([middle.hasPrevious, middle.hasNext]).toEqual([true, true]);
			expect([last.hasPrevious, last.hasNext]).toEqual([true, false]);
		});

		it('should round total pages up', () => {
			expect(createPagedResult([], 0, 10, 100).totalPages).toBe(10);
			expect(createPagedResult([], 0, 10, 101).totalPages).toBe(11);
			expect(createPagedResult([], 0, 10, 5).totalPages).toBe(1);
		});

		it('should report no pages for an empty table', () => {
			const result = createPagedResult([], 0, 10, 0);

			expect(result.totalPages).toBe(0);
			expect(result.hasNext).toBe(false);
			expect(result.hasPrevious).toBe(false);
		});
	});
});
