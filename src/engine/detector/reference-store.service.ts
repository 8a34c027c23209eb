// 기준 비트맵 로드/교체/영속화

import { Inject, Injectable, Logger, Optional, type OnModuleInit } from '@nestjs/common';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { extname, join } from 'path';
import { REFERENCE_NAME, type GrayImage, type ReferenceName } from '../../types/index.js';
import { IMAGE_EXTENSIONS, decodeToGray } from '../../platform/image-codec.js';

export const REFERENCE_DIR = Symbol('REFERENCE_DIR');

/** 정본 이름 뒤에 이어서 찾는 이전 파일명 */
const LEGACY_FILES: Record<ReferenceName, string[]> = {
  hp_indicator: ['hp_bar.png', 'hp_bar.jpg'],
  battle_menu: ['battle_options.png'],
};

const DEFAULT_EXTENSION = '.png';

function startupFiles(name: ReferenceName): string[] {
  const canonical = IMAGE_EXTENSIONS.map((ext) => `${name}${ext}`);
  return [...canonical, ...LEGACY_FILES[name].filter((file) => !canonical.includes(file))];
}

function imageExtension(path: string): string {
  const ext = extname(path).toLowerCase();
  return IMAGE_EXTENSIONS.some((known) => known === ext) ? ext : DEFAULT_EXTENSION;
}

export interface ReferenceInfo {
  name: ReferenceName;
  loaded: boolean;
  width: number | null;
  height: number | null;
}

export interface LoadFromFileResult {
  loaded: boolean;
  persistedTo: string | null;
}

@Injectable()
export class ReferenceStoreService implements OnModuleInit {
  private readonly logger = new Logger(ReferenceStoreService.name);
  private readonly references = new Map<ReferenceName, GrayImage>();
  private readonly dir: string;

  constructor(@Optional() @Inject(REFERENCE_DIR) dir?: string) {
    this.dir = dir ?? process.env.BOT_REFERENCE_DIR ?? join(process.cwd(), 'references');
  }

  async onModuleInit(): Promise<void> {
    const loaded = await this.loadStartupFiles();
    this.logger.log(
      `References loaded from ${this.dir}: ${loaded.length > 0 ? loaded.join(', ') : '(none)'}`,
    );
  }

  private canonicalPath(name: ReferenceName, ext: string = DEFAULT_EXTENSION): string {
    return join(this.dir, `${name}${ext}`);
  }

  /** PNG/JPEG 디코딩, 실패 시 false: 기존 비트맵은 유지 */
  async load(name: ReferenceName, bytes: Buffer): Promise<boolean> {
    try {
      const image = await decodeToGray(bytes);
      if (image.width === 0 || image.height === 0) {
        this.logger.warn(`Reference ${name} is empty`);
        return false;
      }
      this.references.set(name, image);
      return true;
    } catch (err) {
      this.logger.warn(`Reference ${name} could not be decoded: ${String(err)}`);
      return false;
    }
  }

  /**
   * 파일에서 로드, persist면 원본 확장자 그대로 정본 경로에 복사해 재시작 후에도 남긴다.
   * 다른 확장자의 정본 파일은 지워서 시작 시 예전 것이 먼저 읽히지 않게 한다.
   */
  async loadFromFile(
    name: ReferenceName,
    path: string,
    persist = false,
  ): Promise<LoadFromFileResult> {
    let bytes: Buffer;
    try {
      bytes = await readFile(path);
    } catch (err) {
      this.logger.warn(`Reference file ${path} unreadable: ${String(err)}`);
      return { loaded: false, persistedTo: null };
    }

    if (!(await this.load(name, bytes))) {
      return { loaded: false, persistedTo: null };
    }
    this.logger.log(`Reference ${name} loaded from ${path}`);

    if (!persist) return { loaded: true, persistedTo: null };

    const ext = imageExtension(path);
    const target = this.canonicalPath(name, ext);
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(target, bytes);
      for (const other of IMAGE_EXTENSIONS) {
        if (other !== ext) await rm(this.canonicalPath(name, other), { force: true });
      }
      return { loaded: true, persistedTo: target };
    } catch (err) {
      this.logger.warn(`Reference ${name} loaded but not persisted: ${String(err)}`);
      return { loaded: true, persistedTo: null };
    }
  }

  get(name: ReferenceName): GrayImage | undefined {
    return this.references.get(name);
  }

  has(name: ReferenceName): boolean {
    return this.references.has(name);
  }

  list(): ReferenceInfo[] {
    return REFERENCE_NAME.map((name) => {
      const image = this.references.get(name);
      return {
        name,
        loaded: image !== undefined,
        width: image?.width ?? null,
        height: image?.height ?? null,
      };
    });
  }

  private async loadStartupFiles(): Promise<ReferenceName[]> {
    const loaded: ReferenceName[] = [];
    for (const name of REFERENCE_NAME) {
      for (const file of startupFiles(name)) {
        const bytes = await readFile(join(this.dir, file)).catch(() => null);
        if (bytes && (await this.load(name, bytes))) {
          loaded.push(name);
          break;
        }
      }
    }
    return loaded;
  }
}
