import { beforeEach, describe, expect, it } from 'vitest';

import { Component, Inject, Named } from '../src/decorators/index.js';
import { StaticComponentRegistry } from '../src/registry/static-registry.js';
import { Lifecycle } from '../src/types/types.js';

class Database {}
class Logger {}

describe('Decorators', () => {
  beforeEach(() => {
    StaticComponentRegistry.reset();
  });

  describe('@Component', () => {
    it('records singleton metadata by default', () => {
      @Component()
      class Service {}

      expect(StaticComponentRegistry.getComponent(Service)).toEqual({
        qualifier: null,
        lifecycle: Lifecycle.Singleton,
      });
      expect(StaticComponentRegistry.getDecoratedComponents()).toEqual([Service]);
    });

    it('records qualifier, lifecycle and registration type', () => {
      abstract class Shape {}

      @Component({ qualifier: 'circle', lifecycle: Lifecycle.Transient, provides: Shape })
      class Circle extends Shape {}

      expect(StaticComponentRegistry.getComponent(Circle)).toEqual({
        qualifier: 'circle',
        lifecycle: Lifecycle.Transient,
        provides: Shape,
      });
    });

    it('rejects malformed options when the decorator is evaluated', () => {
      expect(() => Component({ qualifier: '' })).toThrow('@Component() qualifier must be a non-empty string.');
      expect(() => Component({ lifecycle: 'scoped' as never })).toThrow(
        '@Component() lifecycle must be one of: singleton, transient.'
      );
      expect(() => Component({ provides: 'Shape' as never })).toThrow('@Component() provides must be a class.');
    });
  });

  describe('@Inject', () => {
    it('marks the class constructor with its argument types', () => {
      @Inject(Database, Logger)
      class Repository {
        constructor(
          readonly db: Database,
          readonly logger: Logger
        ) {}
      }

      expect(StaticComponentRegistry.describe(Repository).constructors).toEqual([
        {
          kind: 'constructor',
          key: null,
          dependencies: [
            { type: Database, qualifier: null },
            { type: Logger, qualifier: null },
          ],
        },
      ]);
    });

    it('marks static methods as factory constructors', () => {
      class Repository {
        private constructor(readonly db: Database) {}

        @Inject(Database)
        static open(db: Database) {
          return new Repository(db);
        }
      }

      expect(StaticComponentRegistry.describe(Repository).constructors).toEqual([
        { kind: 'constructor', key: 'open', dependencies: [{ type: Database, qualifier: null }] },
      ]);
    });

    it('records fields on the side they are declared', () => {
      class Service {
        @Inject(Database) db?: Database;
        @Inject(Logger) static logger?: Logger;
      }

      expect(StaticComponentRegistry.describe(Service).fields).toEqual([
        { kind: 'field', key: 'db', dependency: { type: Database, qualifier: null }, isStatic: false },
        { kind: 'field', key: 'logger', dependency: { type: Logger, qualifier: null }, isStatic: true },
      ]);
    });

    it('records instance methods as setters', () => {
      class Service {
        logger?: Logger;

        @Inject(Logger)
        setLogger(logger: Logger) {
          this.logger = logger;
        }
      }

      expect(StaticComponentRegistry.describe(Service).setters).toEqual([
        { kind: 'setter', key: 'setLogger', dependencies: [{ type: Logger, qualifier: null }] },
      ]);
    });

    it('requires exactly one type on a field', () => {
      class Service {}

      expect(() => Inject(Database, Logger)(Service.prototype, 'db')).toThrow(
        '@Inject() on field Service.db expects exactly one type, got 2.'
      );
      expect(() => Inject()(Service.prototype, 'db')).toThrow('expects exactly one type, got 0.');
    });

    it('rejects non-class arguments before decorating anything', () => {
      expect(() => Inject(Database, undefined as never)).toThrow(
        '@Inject() expects classes; argument 1 is undefined.'
      );
      expect(() => Inject('Database' as never)).toThrow('argument 0 is string');
    });

    it('rejects a plain object as a class target', () => {
      expect(() => Inject(Database)({})).toThrow('@Inject() must decorate a class or a class member.');
    });
  });

  describe('@Named', () => {
    it('qualifies constructor and method parameters', () => {
      @Inject(Logger, Logger)
      class Service {
        constructor(
          readonly main: Logger,
          @Named('audit') readonly audit: Logger
        ) {}

        @Inject(Database)
        setDatabase(@Named('replica') _db: Database) {}
      }

      const def = StaticComponentRegistry.describe(Service);

      expect(def.constructors[0].dependencies).toEqual([
        { type: Logger, qualifier: null },
        { type: Logger, qualifier: 'audit' },
      ]);
      expect(def.setters[0].dependencies).toEqual([{ type: Database, qualifier: 'replica' }]);
    });

    it('qualifies fields', () => {
      class Service {
        @Inject(Logger) @Named('audit') logger?: Logger;
      }

      expect(StaticComponentRegistry.describe(Service).fields[0].dependency).toEqual({
        type: Logger,
        qualifier: 'audit',
      });
    });

    it('sets the component qualifier when placed on the class', () => {
      @Component()
      @Named('primary')
      class Service {}

      expect(StaticComponentRegistry.getComponent(Service)?.qualifier).toBe('primary');
    });

    it('rejects empty and reserved qualifiers', () => {
      expect(() => Named('')).toThrow('@Named() expects a non-empty qualifier string.');
      expect(() => Named('__default__')).toThrow("@Named('__default__') is reserved");
    });
  });
});
