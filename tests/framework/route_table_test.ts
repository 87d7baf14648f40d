/**
 * Route Table Tests
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';

import { RouteTable } from '../../framework/router/route_table.ts';
import { createRoute, normalizeMethods } from '../../framework/router/route.ts';
import {
  DuplicatePlaceholder,
  DuplicateRouteName,
  EmptyMethodList,
  InvalidRequirementPattern,
  RouterErrorCodes,
  UndeclaredPlaceholderRequirement,
} from '../../framework/router/errors.ts';
import { sampleRecords } from '../test_utils.ts';

test('RouteTable.findByName - returns the normalized route', () => {
  const table = RouteTable.build(sampleRecords());
  const user = table.findByName('user');

  assert.ok(user);
  assert.equal(user.name, 'user');
  assert.equal(user.path, '/user/{id}');
  assert.equal(user.controller, 'user_controller::crud');
  assert.equal(user.middleware, 'user_middleware::test');
  assert.deepEqual(user.methods, new Set(['get', 'post', 'delete', 'put']));
  assert.deepEqual(user.requirements, new Map([['id', '^[0-9]+']]));
  assert.deepEqual(user.placeholders, ['id']);
  assert.equal(user.language, '');
});

test('RouteTable.findByName - unknown name returns undefined', () => {
  assert.equal(RouteTable.build(sampleRecords()).findByName('admin'), undefined);
});

test('RouteTable.build - defaults middleware to an empty string', () => {
  const home = RouteTable.build(sampleRecords()).findByName('home');

  assert.equal(home?.middleware, '');
  assert.deepEqual(home?.requirements, new Map());
});

test('RouteTable.iterInOrder - keeps declaration order', () => {
  const table = RouteTable.build([
    { name: 'c', path: '/c', controller: 'c::index', methods: 'get' },
    { name: 'a', path: '/a', controller: 'a::index', methods: 'get' },
    { name: 'b', path: '/b', controller: 'b::index', methods: 'get' },
  ]);

  assert.equal(table.size, 3);
  assert.deepEqual(
    [...table.iterInOrder()].map((route) => route.name),
    ['c', 'a', 'b']
  );
  assert.deepEqual(
    [...table].map((route) => route.name),
    ['c', 'a', 'b']
  );
});

test('RouteTable.build - duplicate names fail', () => {
  const records = [...sampleRecords(), { name: 'home', path: '/home', controller: 'x', methods: 'get' }];

  assert.throws(
    () => RouteTable.build(records),
    (error: unknown) => error instanceof DuplicateRouteName && error.routeName === 'home'
  );
});

test('RouteTable.build - requirement for an undeclared placeholder fails', () => {
  assert.throws(
    () =>
      RouteTable.build([
        {
          name: 'user',
          path: '/user/{id}',
          controller: 'user::show',
          methods: 'get',
          requirements: { uid: '[0-9]+' },
        },
      ]),
    (error: unknown) =>
      error instanceof UndeclaredPlaceholderRequirement &&
      error.routeName === 'user' &&
      error.placeholder === 'uid' &&
      error.code === RouterErrorCodes.UNDECLARED_PLACEHOLDER_REQUIREMENT
  );
});

test('RouteTable.build - language must name a placeholder', () => {
  assert.throws(
    () =>
      RouteTable.build([
        { name: 'about', path: '/about', controller: 'pages::about', methods: 'get', language: 'lang' },
      ]),
    (error: unknown) =>
      error instanceof UndeclaredPlaceholderRequirement && error.details.field === 'language'
  );
});

test('RouteTable.build - empty method list fails', () => {
  assert.throws(
    () => RouteTable.build([{ name: 'none', path: '/', controller: 'x', methods: ' , ' }]),
    (error: unknown) => error instanceof EmptyMethodList && error.routeName === 'none'
  );
  assert.throws(
    () => RouteTable.build([{ name: 'absent', path: '/', controller: 'x' }]),
    EmptyMethodList
  );
});

test('RouteTable.build - invalid requirement pattern fails', () => {
  assert.throws(
    () =>
      RouteTable.build([
        {
          name: 'user',
          path: '/user/{id}',
          controller: 'user::show',
          methods: 'get',
          requirements: { id: '[0-9' },
        },
      ]),
    (error: unknown) =>
      error instanceof InvalidRequirementPattern &&
      error.placeholder === 'id' &&
      error.pattern === '[0-9'
  );
});

test('RouteTable.build - repeated placeholder fails', () => {
  assert.throws(
    () =>
      RouteTable.build([
        { name: 'pair', path: '/a/{id}/b/{id}', controller: 'pair::show', methods: 'get' },
      ]),
    (error: unknown) => error instanceof DuplicatePlaceholder && error.placeholder === 'id'
  );
});

test('normalizeMethods - trims, lower-cases and deduplicates', () => {
  assert.deepEqual(normalizeMethods(' GET, post ,get,'), new Set(['get', 'post']));
  assert.deepEqual(normalizeMethods(['PUT', ' Delete ']), new Set(['put', 'delete']));
  assert.deepEqual(normalizeMethods(undefined), new Set());
});

test('createRoute - converts slash-separated controllers', () => {
  const route = createRoute({ name: 'x', path: '/x', controller: 'admin/users/index', methods: 'get' });

  assert.equal(route.controller, 'admin::users::index');
});

test('createRoute - routes are frozen', () => {
  const route = createRoute({ name: 'x', path: '/x/{id}', controller: 'x', methods: 'get' });

  assert.equal(Object.isFrozen(route), true);
  assert.equal(Object.isFrozen(route.placeholders), true);
});

test('createRoute - placeholders named like Object members', () => {
  const route = createRoute({
    name: 'item',
    path: '/items/{constructor}/{__proto__}',
    controller: 'item::show',
    methods: 'get',
    requirements: { ['__proto__']: '[0-9]+' },
  });

  assert.deepEqual(route.placeholders, ['constructor', '__proto__']);
  assert.deepEqual(route.requirements, new Map([['__proto__', '[0-9]+']]));
});
