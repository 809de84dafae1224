#!/usr/bin/env node
import { Command } from 'commander';
import { getPackageVersion } from './utils/version.js';
import { listCommand } from './cli/list.js';
import { installCommand } from './cli/install.js';
import { statusCommand } from './cli/status.js';
import { doctorCommand } from './cli/doctor.js';
import { diffCommand } from './cli/diff.js';
import { envCommand } from './cli/env.js';
import { buildSettingsCommand } from './cli/build-settings.js';

const program = new Command();

program
  .name('framework-setup')
  .description('게임 프로젝트 프레임워크 모듈 스캐폴딩 CLI')
  .version(getPackageVersion());

program
  .command('list')
  .description('모듈 목록과 설치 여부 표시')
  .action(listCommand);

program
  .command('install')
  .description('모듈 설치 (이미 있는 산출물은 건너뜀)')
  .argument('[modules...]', '설치할 모듈 이름')
  .option('--all', '전체 모듈 설치')
  .option('--code-only', '코드만 기록하고 에셋/씬 단계는 다음 실행으로 미룸')
  .option('--scene <path>', '배선할 씬 논리 경로')
  .action(installCommand);

program
  .command('status')
  .description('모듈별 설치 상태 표시')
  .action(statusCommand);

program
  .command('doctor')
  .description('설치 건강 진단')
  .action(doctorCommand);

program
  .command('diff')
  .description('생성된 파일과 현재 템플릿 비교')
  .argument('<module>', '모듈 이름')
  .action(diffCommand);

program
  .command('env')
  .description('Dev/Prod 환경 전환')
  .argument('<environment>', 'dev | prod')
  .action(envCommand);

program
  .command('build-settings')
  .description('활성 환경의 빌드 identity 를 PlayerSettings 에 적용')
  .option('--bump', 'versionCode 를 1 올린 뒤 적용')
  .action(buildSettingsCommand);

await program.parseAsync();
