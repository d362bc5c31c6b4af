import { createControllers, tableNames } from '../src/controllers';
import { Logger } from '../src/utils/logger';

describe('createControllers', () => {
  const config = { DYNAMODB_RINGDATA_TABLE: 'acme_data', DYNAMODB_ENTITY_TABLE: 'acme_entities' };

  test("getDocument('portfolio', 'org', 'ring', 'idx') resolves the stored document", async () => {
    const { data } = createControllers(config, { logger: new Logger('silent') });
    await data.createDocument('portfolio', 'org', 'ring', { title: 'Index' }, { docId: 'idx' });

    const doc = await data.getDocument('portfolio', 'org', 'ring', 'idx');

    expect(doc.docId).toBe('idx');
    expect(doc.data).toEqual({ title: 'Index' });
  });

  test('table names come from config with defaults for the optional tables', () => {
    expect(tableNames(config)).toEqual({
      ringData: 'acme_data',
      entity: 'acme_entities',
      rel: 'default_rel_table',
      chat: 'default_chat_table',
    });
  });

  test('all controllers share one in-memory store', async () => {
    const { auth, chat } = createControllers(config, { logger: new Logger('silent') });
    await auth.createEntity('irn:entity:user', { name: 'Jane' }, { id: 'u1' });
    const thread = await chat.ensureThread({ portfolio: 'p', org: 'o', entityType: 'user', entityId: 'u1' });

    expect((await auth.getEntity('irn:entity:user', 'u1')).attributes.name).toBe('Jane');
    expect((await chat.listThreads({ portfolio: 'p', org: 'o', entityType: 'user', entityId: 'u1' }))[0]?._id).toBe(
      thread._id,
    );
  });
});
