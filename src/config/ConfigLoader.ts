/**
 * ConfigLoader - 마켓 플랫폼 YAML 설정 로더
 * Singleton Pattern
 *
 * 역할:
 * - {프로젝트 루트}/config/platforms/*.yaml 파일 로드
 * - MarketConfig 스키마 검증 (Zod)
 * - 설정 캐싱
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { MarketConfig, MarketConfigSchema } from "@/core/domain/MarketConfig";
import { ScanError, ScanErrorType } from "@/core/interfaces/ScanErrorType";
import { MARKET_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";

/**
 * 플랫폼 설정 디렉토리 (프로젝트 루트 기준 config/platforms)
 * src/config 와 dist/config 모두 두 단계 위가 프로젝트 루트
 */
const PLATFORM_CONFIG_DIR = path.join(
  __dirname,
  "..",
  "..",
  "config",
  "platforms",
);

/**
 * Config Loader (Singleton)
 */
export class ConfigLoader {
  private static instance: ConfigLoader;
  private configCache: Map<string, MarketConfig> = new Map();

  private constructor(private readonly configDir: string) {}

  /**
   * Singleton 인스턴스 반환
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader(
        MARKET_CONFIG.CONFIG_DIR_OVERRIDE ?? PLATFORM_CONFIG_DIR,
      );
    }
    return ConfigLoader.instance;
  }

  /**
   * 특정 디렉토리 기준 로더 생성 (테스트/도구용, 캐시 공유 안 함)
   */
  static fromDirectory(configDir: string): ConfigLoader {
    return new ConfigLoader(configDir);
  }

  /**
   * 플랫폼 YAML 설정 파일 로드
   * @param platform 플랫폼 이름 (예: "fragment")
   */
  loadConfig(platform: string): MarketConfig {
    const cached = this.configCache.get(platform);
    if (cached) {
      return cached;
    }

    const configPath = path.join(this.configDir, `${platform}.yaml`);

    if (!fs.existsSync(configPath)) {
      throw new ScanError(
        ScanErrorType.CONFIG_INVALID,
        `Config file not found: ${configPath}`,
      );
    }

    const fileContent = fs.readFileSync(configPath, "utf8");
    let rawConfig: unknown;
    try {
      rawConfig = yaml.load(fileContent);
    } catch (error) {
      throw new ScanError(
        ScanErrorType.CONFIG_INVALID,
        `Invalid YAML in ${configPath}`,
        { cause: error instanceof Error ? error : undefined },
      );
    }

    // Zod 스키마 검증
    const parseResult = MarketConfigSchema.safeParse(rawConfig);
    if (!parseResult.success) {
      logger.error(
        { platform, errors: parseResult.error.errors },
        "Market config validation failed",
      );
      throw new ScanError(
        ScanErrorType.CONFIG_INVALID,
        `Invalid market config for ${platform}: ${parseResult.error.message}`,
      );
    }

    const config = this.applyOverrides(parseResult.data);
    this.configCache.set(platform, config);

    logger.debug(
      { platform, baseUrl: config.baseUrl },
      "Market config loaded",
    );

    return config;
  }

  /**
   * 환경변수 오버라이드 적용
   */
  private applyOverrides(config: MarketConfig): MarketConfig {
    if (!MARKET_CONFIG.BASE_URL_OVERRIDE) {
      return config;
    }
    return { ...config, baseUrl: MARKET_CONFIG.BASE_URL_OVERRIDE };
  }

  /**
   * 사용 가능한 플랫폼 목록 반환
   */
  getAvailablePlatforms(): string[] {
    if (!fs.existsSync(this.configDir)) {
      logger.warn({ configDir: this.configDir }, "Platform config directory not found");
      return [];
    }

    return fs
      .readdirSync(this.configDir)
      .filter((file) => file.endsWith(".yaml"))
      .map((file) => file.replace(/\.yaml$/, ""));
  }

  /**
   * 캐시 클리어 (테스트용)
   */
  clearCache(): void {
    this.configCache.clear();
  }
}
