import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { InvalidTaskIdError } from '../http/error-handler.js';
import {
    parseCreateTaskBody,
    parseListQuery,
    parseSearchBody,
    parseTaskId,
    parseUpdateTaskBody,
} from '../task-schemas.js';

describe('task request parsing', () => {
    it('maps a create body to the domain request', () => {
        expect(
            parseCreateTaskBody({ title: 'Plan sprint', assigned_to: 'erin', tags: ['planning'], extra: true }),
        ).toEqual({ title: 'Plan sprint', assignedTo: 'erin', tags: ['planning'] });
    });

    it('treats a missing create body as an empty title', () => {
        expect(parseCreateTaskBody(undefined)).toEqual({ title: '' });
    });

    it('rejects fields of the wrong type', () => {
        expect(() => parseCreateTaskBody({ title: 5 })).toThrow(ZodError);
        expect(() => parseUpdateTaskBody({ tags: 'one,two' })).toThrow(ZodError);
    });

    it('treats null update fields as absent and keeps empty strings', () => {
        const request = parseUpdateTaskBody({ title: null, assigned_to: '' });
        expect(request.title).toBeUndefined();
        expect(request.assignedTo).toBe('');
    });

    it('maps a search body with embedded filters', () => {
        const query = parseSearchBody({
            query: 'docs',
            fields: ['title'],
            filters: { status: 'pending', assigned_to: 'alice', limit: 5 },
            sort_by: 'priority',
            sort_desc: true,
        });

        expect(query.query).toBe('docs');
        expect(query.fields).toEqual(['title']);
        expect(query.filter).toEqual({ status: 'pending', assignedTo: 'alice', limit: 5 });
        expect(query.sortBy).toBe('priority');
        expect(query.sortDesc).toBe(true);
    });

    it('defaults an empty search body', () => {
        const query = parseSearchBody({});
        expect(query.query).toBe('');
        expect(query.filter).toBeUndefined();
        expect(query.sortDesc).toBe(false);
    });

    it('parses list query parameters and ignores bad numbers', () => {
        expect(
            parseListQuery({ status: 'pending', tags: 'api, docs,,', limit: 'ten', offset: '-1', assigned_to: 'bob' }),
        ).toEqual({ status: 'pending', tags: ['api', 'docs'], assignedTo: 'bob' });
        expect(parseListQuery({ limit: '0', offset: '0' })).toEqual({ offset: 0 });
        expect(parseListQuery({ limit: ['3', '9'] })).toEqual({ limit: 3 });
    });

    it('accepts integer task IDs only', () => {
        expect(parseTaskId('42')).toBe(42);
        expect(() => parseTaskId('4.2')).toThrow(InvalidTaskIdError);
        expect(() => parseTaskId('abc')).toThrow('Invalid task ID');
    });
});
