import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { product } from '../../__tests__/helpers.js';
import { ConfigurationError } from '../../utils/errors.js';
import { CategoryStore, type CategoryResolutionRequest } from '../categoryStore.js';
import { DEFAULT_CATEGORY_PATH } from '../categoryTransform.js';
import { JsonFileMappingStore, MemoryMappingStore } from '../mappingStore.js';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('CategoryStore lookup', () => {
  test('matches stored categories after entity and space normalization', async () => {
    const store = new CategoryStore({
      store: new MemoryMappingStore([{ oldCategory: 'Chladenie &amp; mrazenie', newCategory: 'Chladenie' }]),
    });

    expect(await store.resolve('Chladenie & mrazenie')).toBe('Chladenie');
    expect(await store.resolve('Chladenie\u00a0&amp;\u00a0mrazenie')).toBe('Chladenie');
  });

  test('the earliest mapping wins', async () => {
    const store = new CategoryStore({
      store: new MemoryMappingStore([
        { oldCategory: 'Stoly', newCategory: 'Nábytok/Stoly' },
        { oldCategory: 'Stoly', newCategory: 'Iné' },
      ]),
    });

    expect(await store.resolve('Stoly')).toBe('Nábytok/Stoly');
  });

  test('a known canonical category resolves to itself', async () => {
    const resolver = vi.fn(() => 'never used');
    const store = new CategoryStore({
      store: new MemoryMappingStore([{ oldCategory: 'Chladenie|Vitríny', newCategory: 'Vitríny' }]),
      resolver,
    });

    expect(await store.resolve('Vitríny')).toBe('Vitríny');
    expect(resolver).not.toHaveBeenCalled();
  });

  test('blank categories resolve to an empty string', async () => {
    const store = new CategoryStore({ store: new MemoryMappingStore() });
    expect(await store.resolve('  ')).toBe('');
    expect(await store.resolve('nan')).toBe('');
  });
});

describe('CategoryStore resolver', () => {
  test('asks once per raw category and reuses the stored answer', async () => {
    const backing = new MemoryMappingStore();
    const resolver = vi.fn(async () => 'Tovary a kategórie > Vitríny');
    const store = new CategoryStore({ store: backing, resolver, pathFormat: DEFAULT_CATEGORY_PATH });
    const records = [
      product('V1', 'Vitrína chladiaca 900', { defaultCategory: 'Chladenie|Vitríny' }),
      product('V2', 'Vitrína chladiaca 1200', { defaultCategory: 'Chladenie|Vitríny' }),
    ];

    await store.categorize(records);

    expect(records.map(record => record.resolvedCategory)).toEqual([
      'Tovary a kategórie > Vitríny',
      'Tovary a kategórie > Vitríny',
    ]);
    expect(records.map(record => record.canonicalCategory)).toEqual([
      'Tovary a kategórie > Vitríny',
      'Tovary a kategórie > Vitríny',
    ]);
    expect(resolver).toHaveBeenCalledTimes(1);
    expect(resolver).toHaveBeenCalledWith(
      expect.objectContaining({ rawCategory: 'Chladenie|Vitríny', productName: 'Vitrína chladiaca 900' })
    );
    expect(backing.load()).toEqual([
      { oldCategory: 'Chladenie|Vitríny', newCategory: 'Tovary a kategórie > Vitríny' },
    ]);
  });

  test('offers ranked suggestions from the known categories', async () => {
    const requests: CategoryResolutionRequest[] = [];
    const store = new CategoryStore({
      store: new MemoryMappingStore([
        { oldCategory: 'Vitrínky', newCategory: 'Tovary a kategórie > Chladenie > Vitríny' },
        { oldCategory: 'Stolíky', newCategory: 'Tovary a kategórie > Nábytok > Stoly' },
      ]),
      resolver: request => {
        requests.push(request);
        return null;
      },
    });

    await store.resolve('Chladenie/Vitríny', 'Vitrína 900');

    expect(requests).toHaveLength(1);
    expect(requests[0].suggestions).toHaveLength(2);
    expect(requests[0].suggestions[0].category).toBe('Tovary a kategórie > Chladenie > Vitríny');
  });

  test('a decline keeps the raw category and is not asked again', async () => {
    const backing = new MemoryMappingStore();
    const resolver = vi.fn(() => null);
    const store = new CategoryStore({ store: backing, resolver });

    expect(await store.resolve('Rôzne')).toBe('Rôzne');
    expect(await store.resolve('Rôzne')).toBe('Rôzne');

    expect(resolver).toHaveBeenCalledTimes(1);
    expect(backing.load()).toEqual([{ oldCategory: 'Rôzne', newCategory: 'Rôzne' }]);
    expect(store.knownCategories()).toEqual([]);
  });

  test('without a resolver the raw category passes through and nothing is stored', async () => {
    const backing = new MemoryMappingStore();
    const store = new CategoryStore({ store: backing });

    expect(await store.resolve('Nové')).toBe('Nové');
    expect(store.size).toBe(0);
    expect(backing.load()).toEqual([]);
  });

  test('concurrent resolutions of one category share a single answer', async () => {
    const resolver = vi.fn(
      () => new Promise<string>(resolve => setTimeout(() => resolve('Chladenie'), 5))
    );
    const store = new CategoryStore({ store: new MemoryMappingStore(), resolver });

    const answers = await Promise.all([store.resolve('Mrazničky'), store.resolve('Mrazničky')]);

    expect(answers).toEqual(['Chladenie', 'Chladenie']);
    expect(resolver).toHaveBeenCalledTimes(1);
    expect(store.size).toBe(1);
  });

  test('a resolver that does not answer in time counts as a decline', async () => {
    const store = new CategoryStore({
      store: new MemoryMappingStore(),
      resolver: () => new Promise<string | null>(() => {}),
      resolverTimeoutMs: 10,
    });

    expect(await store.resolve('Pomalé')).toBe('Pomalé');
    expect(store.size).toBe(0);
  });

  test('a failing resolver leaves the category unchanged', async () => {
    const store = new CategoryStore({
      store: new MemoryMappingStore(),
      resolver: () => {
        throw new Error('dialog closed');
      },
    });

    expect(await store.resolve('Chyba')).toBe('Chyba');
    expect(store.size).toBe(0);
  });

  test('add() does not create a second entry for a mapped category', () => {
    const store = new CategoryStore({ store: new MemoryMappingStore() });

    expect(store.add('Stoly', 'Nábytok')).toBe('Nábytok');
    expect(store.add('Stoly', 'Iné')).toBe('Nábytok');
    expect(store.size).toBe(1);
  });
});

describe('JsonFileMappingStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'category-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('starts empty when the file is missing and persists each append', () => {
    const file = path.join(dir, 'nested', 'mappings.json');
    const store = new CategoryStore({ store: new JsonFileMappingStore(file) });

    store.add('Stoly', 'Nábytok/Stoly');

    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual([
      { oldCategory: 'Stoly', newCategory: 'Nábytok/Stoly' },
    ]);
    expect(new JsonFileMappingStore(file).load()).toEqual([
      { oldCategory: 'Stoly', newCategory: 'Nábytok/Stoly' },
    ]);
  });

  test('reload() picks up entries written elsewhere and flush() rewrites the file', () => {
    const file = path.join(dir, 'mappings.json');
    const store = new CategoryStore({ store: new JsonFileMappingStore(file) });
    fs.writeFileSync(file, JSON.stringify([{ oldCategory: 'Regály', newCategory: 'Sklad/Regály' }]));

    store.reload();
    expect(store.lookup('Regály')).toBe('Sklad/Regály');

    fs.writeFileSync(file, '[]');
    store.flush();
    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual([
      { oldCategory: 'Regály', newCategory: 'Sklad/Regály' },
    ]);
  });

  test('a corrupt file is a configuration error', () => {
    const file = path.join(dir, 'mappings.json');
    fs.writeFileSync(file, '{ not json');

    expect(() => new CategoryStore({ store: new JsonFileMappingStore(file) })).toThrow(ConfigurationError);
  });

  test('entries of the wrong shape are a configuration error', () => {
    const file = path.join(dir, 'mappings.json');
    fs.writeFileSync(file, JSON.stringify([{ oldCategory: 1 }]));

    expect(() => new JsonFileMappingStore(file).load()).toThrow(/corrupt/);
  });
});

describe('CategoryStore known categories', () => {
  test('matches mappings stored with accented letters against entity-encoded input', async () => {
    const store = new CategoryStore({
      store: new MemoryMappingStore([{ oldCategory: 'Chladenie|Vitríny', newCategory: 'Chladenie/Vitríny' }]),
    });

    expect(await store.resolve('Chladenie|Vitr&iacute;ny')).toBe('Chladenie/Vitríny');
  });

  test('registered categories resolve to themselves and feed suggestions', async () => {
    const resolver = vi.fn(() => null);
    const store = new CategoryStore({ store: new MemoryMappingStore(), resolver });

    store.registerKnownCategories(['Nábytok/Stoly', '  ', ' Chladenie/Vitríny ']);

    expect(store.knownCategories()).toEqual(['Nábytok/Stoly', 'Chladenie/Vitríny']);
    expect(await store.resolve('Nábytok/Stoly')).toBe('Nábytok/Stoly');
    expect(resolver).not.toHaveBeenCalled();
    expect(store.suggest('Stoly', 1)).toEqual([expect.objectContaining({ category: 'Nábytok/Stoly' })]);
  });

  test('mappingsSnapshot returns copies', async () => {
    const store = new CategoryStore({
      store: new MemoryMappingStore([{ oldCategory: 'Stoly', newCategory: 'Nábytok/Stoly' }]),
    });

    const snapshot = store.mappingsSnapshot();
    snapshot[0].newCategory = 'Iné';

    expect(store.mappingsSnapshot()).toEqual([{ oldCategory: 'Stoly', newCategory: 'Nábytok/Stoly' }]);
    expect(await store.resolve('Stoly')).toBe('Nábytok/Stoly');
  });
});
