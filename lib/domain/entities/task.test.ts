import { test } from 'node:test';
import assert from 'node:assert/strict';
import { TaskDomain, type Task } from './task.ts';
import { InvalidTaskPayloadError, TitleRequiredError } from '../errors/index.ts';

const created = new Date('2024-01-01T00:00:00.000Z');

function sampleTask(): Task {
  return {
    id: 'task-1',
    title: 'write report',
    description: 'quarterly',
    done: false,
    createdAt: created,
    updatedAt: created,
  };
}

test('TaskDomain.parseCreate - accepts title and defaults description', () => {
  const result = TaskDomain.parseCreate({ title: 'buy milk' });

  assert.equal(result.success, true);
  if (result.success) {
    assert.deepEqual(result.data, { title: 'buy milk', description: '' });
  }
});

test('TaskDomain.parseCreate - missing or empty title is rejected', () => {
  for (const body of [{}, { title: '' }, { description: 'no title' }]) {
    const result = TaskDomain.parseCreate(body);
    assert.equal(result.success, false);
    if (!result.success) {
      assert.ok(result.error instanceof TitleRequiredError);
      assert.equal(result.error.message, 'title is required');
      assert.equal(result.error.statusCode, 400);
    }
  }
});

test('TaskDomain.parseCreate - non-object and mistyped bodies are invalid payloads', () => {
  for (const body of [null, 'text', 42, ['a'], { title: 7 }, { title: 'ok', description: false }]) {
    const result = TaskDomain.parseCreate(body);
    assert.equal(result.success, false);
    if (!result.success) {
      assert.ok(result.error instanceof InvalidTaskPayloadError);
      assert.equal(result.error.code, 'INVALID_REQUEST_BODY');
    }
  }
});

test('TaskDomain.parseUpdate - keeps only non-empty strings and boolean done', () => {
  const result = TaskDomain.parseUpdate({ title: '', description: 'new', done: true });

  assert.equal(result.success, true);
  if (result.success) {
    assert.deepEqual(result.data, { description: 'new', done: true });
  }
});

test('TaskDomain.parseUpdate - null done is ignored, string done is invalid', () => {
  const ignored = TaskDomain.parseUpdate({ done: null });
  assert.equal(ignored.success, true);
  if (ignored.success) {
    assert.deepEqual(ignored.data, {});
  }

  const invalid = TaskDomain.parseUpdate({ done: 'yes' });
  assert.equal(invalid.success, false);
  if (!invalid.success) {
    assert.equal(invalid.error.field, 'done');
  }
});

test('TaskDomain.applyUpdate - returns a new record with updatedAt set', () => {
  const task = sampleTask();
  const later = new Date('2024-01-01T00:00:05.000Z');

  const updated = TaskDomain.applyUpdate(task, { done: true }, later);

  assert.notEqual(updated, task);
  assert.equal(updated.title, 'write report');
  assert.equal(updated.description, 'quarterly');
  assert.equal(updated.done, true);
  assert.equal(updated.createdAt, created);
  assert.deepEqual(updated.updatedAt, later);
  assert.equal(task.done, false);
});

test('TaskDomain.applyUpdate - updatedAt advances even when the clock has not', () => {
  const task = sampleTask();

  const first = TaskDomain.applyUpdate(task, { done: true }, created);
  const second = TaskDomain.applyUpdate(first, { title: 'again' }, created);

  assert.equal(first.updatedAt.toISOString(), '2024-01-01T00:00:00.001Z');
  assert.equal(second.updatedAt.toISOString(), '2024-01-01T00:00:00.002Z');
  assert.equal(first.createdAt, created);
});

test('TaskDomain.toResponse - uses snake_case ISO timestamps', () => {
  assert.deepEqual(TaskDomain.toResponse(sampleTask()), {
    id: 'task-1',
    title: 'write report',
    description: 'quarterly',
    done: false,
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
  });
});
