import { describe, it, expect } from 'vitest';
import { z } from 'zod';

import { InvalidArgumentError } from '../errors.ts';
import { testApp } from '../test/create-app.ts';

import { defineQueryParameters } from './query-parameters.ts';
import { RequestDescriptor } from './request-descriptor.ts';

const listUsers = defineQueryParameters(
  {
    pageSize: z.number().int().optional(),
    search: z.string().optional(),
    includeDisabled: z.boolean().optional(),
    since: z.date().optional(),
  },
  { pageSize: 'page_size', includeDisabled: 'include_disabled' },
);

describe('defineQueryParameters', () => {
  it('emits aliased names and plain field names', () => {
    const source = listUsers({ pageSize: 0, search: 'ada', includeDisabled: false });

    expect([...source.toQueryParameterEntries()]).toEqual([
      ['page_size', 0],
      ['search', 'ada'],
      ['include_disabled', false],
    ]);
  });

  it('omits fields that were not supplied', () => {
    const source = listUsers({ search: 'ada' });

    expect([...source.toQueryParameterEntries()]).toEqual([['search', 'ada']]);
  });

  it('rejects input that does not match the schema', () => {
    expect(() => listUsers({ pageSize: 1.5 })).toThrow(InvalidArgumentError);
    expect(() => listUsers({ pageSize: 1.5 })).toThrow(/^Invalid query parameters: pageSize: /);
  });

  it('feeds the descriptor query parameters', () => {
    const { app } = testApp();
    const descriptor = new RequestDescriptor({ urlTemplate: '/users{?page_size,search}', app });

    descriptor.setQueryParameters(listUsers({ pageSize: 25, search: 'ada' }));

    expect(descriptor.getUri()).toBe('/users?page_size=25&search=ada');
  });
});
