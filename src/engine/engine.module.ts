import { Module } from '@nestjs/common';
import { ReferenceStoreService } from './detector/reference-store.service.js';
import { DetectorService } from './detector/detector.service.js';
import { ScriptRunnerService } from './battle/script-runner.service.js';
import { BattlePolicyService } from './battle/battle-policy.service.js';
import { MovementService } from './movement/movement.service.js';
import { AutomationService } from './automation/automation.service.js';

const providers = [
  // 감지
  ReferenceStoreService,
  DetectorService,
  // 입력 실행
  ScriptRunnerService,
  // 전투 / 이동
  BattlePolicyService,
  MovementService,
  // 상태 머신
  AutomationService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
