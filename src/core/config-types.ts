import { z } from 'zod';

/**
 * 설정 에셋 타입 레지스트리.
 * 이름 → 스키마 매핑을 빌드 시점에 고정해 두고, 기본 생성 인스턴스는 schema.parse({}) 로 만든다.
 * 필드 기본값은 템플릿 소스의 필드 초기값과 맞춘다.
 */

export const EnvironmentSchema = z.enum(['Dev', 'Prod']);
export type Environment = z.infer<typeof EnvironmentSchema>;

const AppIdentitySchema = z.object({
  appName: z.string(),
  bundleId: z.string(),
  versionName: z.string(),
  versionCode: z.number().int(),
});

export const BuildConfigSchema = z.object({
  activeEnvironment: EnvironmentSchema.default('Dev'),
  dev: AppIdentitySchema.default({
    appName: 'MyGame (Dev)',
    bundleId: 'com.company.mygame.dev',
    versionName: '0.1.0',
    versionCode: 1,
  }),
  prod: AppIdentitySchema.default({
    appName: 'MyGame',
    bundleId: 'com.company.mygame',
    versionName: '1.0.0',
    versionCode: 1,
  }),
  keystorePath: z.string().default(''),
  keystorePass: z.string().default(''),
  keyAlias: z.string().default(''),
  keyPass: z.string().default(''),
  scenes: z.array(z.string()).default(['Assets/Scenes/SampleScene.unity']),
  androidOutputPath: z.string().default('Builds/Android/game.apk'),
  iosOutputPath: z.string().default('Builds/iOS'),
});

export type BuildConfig = z.infer<typeof BuildConfigSchema>;

// Dev 슬롯은 AdMob 공개 테스트 유닛
export const AdsConfigSchema = z.object({
  activeEnvironment: EnvironmentSchema.default('Dev'),
  isAdsEnabled: z.boolean().default(true),
  isRemoveAdsPurchased: z.boolean().default(false),
  dev_banner_android: z.string().default('ca-app-pub-3940256099942544/6300978111'),
  dev_interstitial_android: z.string().default('ca-app-pub-3940256099942544/1033173712'),
  dev_rewarded_android: z.string().default('ca-app-pub-3940256099942544/5224354917'),
  dev_banner_ios: z.string().default('ca-app-pub-3940256099942544/2934735716'),
  dev_interstitial_ios: z.string().default('ca-app-pub-3940256099942544/4411468910'),
  dev_rewarded_ios: z.string().default('ca-app-pub-3940256099942544/1712485313'),
  prod_banner_android: z.string().default(''),
  prod_interstitial_android: z.string().default(''),
  prod_rewarded_android: z.string().default(''),
  prod_banner_ios: z.string().default(''),
  prod_interstitial_ios: z.string().default(''),
  prod_rewarded_ios: z.string().default(''),
});

export const SoundConfigSchema = z.object({
  masterVolume: z.number().min(0).max(1).default(1),
  sfxVolume: z.number().min(0).max(1).default(1),
  musicVolume: z.number().min(0).max(1).default(0.7),
  sounds: z.array(z.object({ type: z.string(), clip: z.string().nullable() })).default([]),
});

export const GameLinksSchema = z.object({
  rateUsAndroid: z.string().default('https://play.google.com/store/apps/details?id=com.company.mygame'),
  rateUsIOS: z.string().default('https://apps.apple.com/app/idXXXXXXXXXX'),
  feedbackFormUrl: z.string().default('https://forms.gle/XXXXXXXXXX'),
  deepLinkUrl: z.string().default('mygame://open'),
  moreGamesAndroid: z.string().default('https://play.google.com/store/apps/developer?id=YourCompany'),
  moreGamesIOS: z.string().default('https://apps.apple.com/developer/yourcompany/idXXXXXXXXXX'),
});

export const CONFIG_TYPE_SCHEMAS: Readonly<Record<string, z.AnyZodObject>> = {
  BuildConfig: BuildConfigSchema,
  AdsConfig: AdsConfigSchema,
  SoundConfig: SoundConfigSchema,
  GameLinks: GameLinksSchema,
};

/** 기본 생성 인스턴스의 필드. 스키마가 없는 타입은 빈 객체 */
export function createDefaultFields(typeName: string): Record<string, unknown> {
  const schema = CONFIG_TYPE_SCHEMAS[typeName];
  if (!schema) return {};
  const fields: Record<string, unknown> = schema.parse({});
  return fields;
}
