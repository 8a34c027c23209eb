import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { NotFoundError, ReferenceLoadError } from '../common/errors/bot-errors.js';
import { encodeGray } from '../platform/image-codec.js';
import { ReferenceStoreService } from '../engine/detector/reference-store.service.js';
import { ReferencesController } from './references.controller.js';

describe('ReferencesController', () => {
  let dir: string;
  let store: ReferenceStoreService;
  let controller: ReferencesController;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'encounter-bot-ctl-'));
    store = new ReferenceStoreService(dir);
    controller = new ReferencesController(store);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('JPEG 파일 로드 + 영속화', async () => {
    const source = join(dir, 'menu.jpeg');
    await writeFile(
      source,
      await encodeGray({ width: 2, height: 2, data: Uint8Array.from([0, 90, 180, 250]) }, 'jpeg'),
    );

    await expect(controller.load('battle_menu', { path: source, persist: true })).resolves.toEqual({
      name: 'battle_menu',
      loaded: true,
      persistedTo: join(dir, 'battle_menu.jpeg'),
    });
    expect(controller.list()[1]).toEqual({ name: 'battle_menu', loaded: true, width: 2, height: 2 });
  });

  it('알 수 없는 이름 → NotFoundError', async () => {
    await expect(controller.load('minimap', { path: '/tmp/x.png', persist: false })).rejects.toThrow(
      NotFoundError,
    );
  });

  it('읽을 수 없는 파일 → REFERENCE_UNREADABLE (422)', async () => {
    const missing = join(dir, 'missing.png');
    await expect(controller.load('hp_indicator', { path: missing, persist: false })).rejects.toMatchObject({
      code: 'REFERENCE_UNREADABLE',
      httpStatus: 422,
      details: { name: 'hp_indicator', path: missing },
    });
    await expect(controller.load('hp_indicator', { path: missing, persist: false })).rejects.toThrow(
      ReferenceLoadError,
    );
  });
});
