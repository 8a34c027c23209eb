import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { GrayImage } from '../../types/index.js';
import { encodeGray } from '../../platform/image-codec.js';
import { ReferenceStoreService } from './reference-store.service.js';

const MENU: GrayImage = {
  width: 4,
  height: 2,
  data: Uint8Array.from([0, 50, 100, 150, 200, 250, 30, 60]),
};

describe('ReferenceStoreService', () => {
  let dir: string;
  let store: ReferenceStoreService;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'encounter-bot-refs-'));
    store = new ReferenceStoreService(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('PNG 디코딩 → 회색조 저장', async () => {
      await expect(store.load('battle_menu', await encodeGray(MENU))).resolves.toBe(true);
      const image = store.get('battle_menu');
      expect(image?.width).toBe(4);
      expect(image?.height).toBe(2);
      expect(Array.from(image?.data ?? [])).toEqual([0, 50, 100, 150, 200, 250, 30, 60]);
    });

    it('JPEG도 로드', async () => {
      await expect(store.load('hp_indicator', await encodeGray(MENU, 'jpeg'))).resolves.toBe(true);
      expect(store.list()[0]).toEqual({ name: 'hp_indicator', loaded: true, width: 4, height: 2 });
    });

    it('디코딩 불가 바이트 → false, 기존 비트맵 유지', async () => {
      await store.load('battle_menu', await encodeGray(MENU));
      await expect(store.load('battle_menu', Buffer.from('not an image'))).resolves.toBe(false);
      expect(store.get('battle_menu')?.width).toBe(4);
    });
  });

  describe('loadFromFile', () => {
    it('persist → 정본 경로에 저장', async () => {
      const source = join(dir, 'picked.png');
      const bytes = await encodeGray(MENU);
      await writeFile(source, bytes);

      const result = await store.loadFromFile('battle_menu', source, true);
      expect(result).toEqual({ loaded: true, persistedTo: join(dir, 'battle_menu.png') });
      expect((await readFile(join(dir, 'battle_menu.png'))).equals(bytes)).toBe(true);
    });

    it('persist 없이 로드만', async () => {
      const source = join(dir, 'picked.png');
      await writeFile(source, await encodeGray(MENU));
      const result = await store.loadFromFile('hp_indicator', source);
      expect(result).toEqual({ loaded: true, persistedTo: null });
      expect(store.has('hp_indicator')).toBe(true);
    });

    it('JPEG는 .jpg 그대로 저장하고 다른 확장자 정본은 지운다', async () => {
      await writeFile(join(dir, 'hp_indicator.png'), await encodeGray(MENU));
      const source = join(dir, 'picked.JPG');
      const bytes = await encodeGray(MENU, 'jpeg');
      await writeFile(source, bytes);

      const result = await store.loadFromFile('hp_indicator', source, true);
      expect(result).toEqual({ loaded: true, persistedTo: join(dir, 'hp_indicator.jpg') });
      expect((await readFile(join(dir, 'hp_indicator.jpg'))).equals(bytes)).toBe(true);
      await expect(readFile(join(dir, 'hp_indicator.png'))).rejects.toThrow();
    });

    it('없는 파일 → loaded false', async () => {
      const result = await store.loadFromFile('hp_indicator', join(dir, 'missing.png'), true);
      expect(result).toEqual({ loaded: false, persistedTo: null });
      expect(store.has('hp_indicator')).toBe(false);
    });
  });

  describe('onModuleInit', () => {
    it('정본 파일과 이전 파일명을 모두 읽는다', async () => {
      await writeFile(join(dir, 'hp_bar.png'), await encodeGray(MENU));
      await writeFile(join(dir, 'battle_menu.png'), await encodeGray(MENU));

      await store.onModuleInit();
      expect(store.list()).toEqual([
        { name: 'hp_indicator', loaded: true, width: 4, height: 2 },
        { name: 'battle_menu', loaded: true, width: 4, height: 2 },
      ]);
    });

    it('이전 JPEG 파일명도 읽는다', async () => {
      await writeFile(join(dir, 'hp_bar.jpg'), await encodeGray(MENU, 'jpeg'));
      await writeFile(join(dir, 'battle_menu.jpg'), await encodeGray(MENU, 'jpeg'));

      await store.onModuleInit();
      expect(store.list().map((r) => r.loaded)).toEqual([true, true]);
    });

    it('파일이 없으면 아무것도 로드하지 않는다', async () => {
      await store.onModuleInit();
      expect(store.list().every((r) => !r.loaded)).toBe(true);
    });
  });
});
