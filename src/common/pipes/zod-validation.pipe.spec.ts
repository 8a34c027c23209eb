import { BotConfigPatchSchema, MaxUsesBodySchema } from '../../config/bot-config.schema.js';
import { LoadReferenceBodySchema } from '../../control/dto/load-reference.dto.js';
import { InvalidInputError } from '../errors/bot-errors.js';
import { ZodValidationPipe } from './zod-validation.pipe.js';

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('ZodValidationPipe', () => {
  const patchPipe = new ZodValidationPipe(BotConfigPatchSchema);

  it('유효한 부분 패치는 그대로 통과', () => {
    const body = { movement: { spaces: 2 }, battle: { maxTurnsPerBattle: null } };
    expect(patchPipe.transform(body)).toEqual(body);
  });

  it('범위 밖 값 → 422 + 경로 포함 메시지', () => {
    const err = caught(() => patchPipe.transform({ detection: { threshold: 2 } }));

    expect(err).toBeInstanceOf(InvalidInputError);
    expect(err).toMatchObject({
      code: 'INVALID_INPUT',
      httpStatus: 422,
      details: { issues: ['detection.threshold: Number must be less than or equal to 1'] },
    });
  });

  it('알 수 없는 키는 거부', () => {
    const err = caught(() => patchPipe.transform({ bogus: 1 }));
    expect(err).toMatchObject({
      details: { issues: ["Unrecognized key(s) in object: 'bogus'"] },
    });
  });

  it('이동 칸 수는 1~4', () => {
    expect(caught(() => patchPipe.transform({ movement: { spaces: 5 } }))).toBeInstanceOf(
      InvalidInputError,
    );
    expect(caught(() => patchPipe.transform({ movement: { spaces: 0 } }))).toBeInstanceOf(
      InvalidInputError,
    );
  });

  it('maxUses는 양의 정수', () => {
    const pipe = new ZodValidationPipe(MaxUsesBodySchema);
    expect(pipe.transform({ maxUses: 35 })).toEqual({ maxUses: 35 });
    expect(caught(() => pipe.transform({ maxUses: 0 }))).toBeInstanceOf(InvalidInputError);
    expect(caught(() => pipe.transform({ maxUses: 1.5 }))).toBeInstanceOf(InvalidInputError);
  });

  it('기본값이 채워진 결과를 돌려준다', () => {
    const pipe = new ZodValidationPipe(LoadReferenceBodySchema);
    expect(pipe.transform({ path: '/tmp/hp.png' })).toEqual({ path: '/tmp/hp.png', persist: false });
  });
});
