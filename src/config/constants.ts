/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 * - 상품 필드 제약과 페이지네이션 상한은 환경변수로 바꿀 수 없음
 */

/**
 * 애플리케이션 메타데이터
 *
 * ⚠️ package.json의 version 필드와 수동 동기화 필요
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Product Catalog",
  API_PREFIX: "/api/v1",
} as const;

/**
 * 데이터베이스 설정
 */
export const DATABASE_CONFIG = {
  /**
   * 상품 테이블명
   * 환경변수: PRODUCT_TABLE_NAME
   * 기본값: "products"
   */
  PRODUCT_TABLE_NAME: process.env.PRODUCT_TABLE_NAME || "products",

  /**
   * 카테고리 목록 뷰 (select distinct category, 최초 등록 순)
   * 환경변수: PRODUCT_CATEGORY_VIEW_NAME
   * 기본값: "product_categories"
   */
  CATEGORY_VIEW_NAME:
    process.env.PRODUCT_CATEGORY_VIEW_NAME || "product_categories",

  /**
   * 조회 시 SELECT 필드
   */
  PRODUCT_FIELDS: ["id", "category", "name"] as const,
} as const;

/**
 * 상품 필드 제약
 */
export const PRODUCT_CONSTRAINTS = {
  CATEGORY_MAX_LENGTH: 100,
  NAME_MAX_LENGTH: 200,
} as const;

/**
 * 페이지네이션 설정
 *
 * - 값이 없을 때만 기본값 적용
 * - 명시적으로 범위를 벗어난 값은 거부 (클램핑하지 않음)
 */
export const PAGINATION_CONFIG = {
  DEFAULT_PAGE: 0,
  DEFAULT_SIZE: 10,
  MAX_SIZE: 100,

  /**
   * 정렬 기준 고정 (id 오름차순)
   * category는 필터 필드이므로 정렬 의미가 없음
   */
  SORT_FIELD: "id",
  SORT_DIRECTION: "asc",
} as const;

/**
 * 저장소 설정 기본값
 */
export const STORE_DEFAULTS = {
  DRIVER: "supabase",

  /**
   * Supabase 요청 타임아웃 (ms)
   * 환경변수: SUPABASE_TIMEOUT_MS
   */
  TIMEOUT_MS: 5000,
} as const;

/**
 * HTTP 서버 기본값
 */
export const SERVER_DEFAULTS = {
  PORT: 3000,
} as const;

/**
 * 로깅 서비스 이름
 * 서비스별 로그 파일 라우팅에 사용
 */
export const SERVICE_NAMES = {
  /**
   * Express 서버
   * 로그 파일: logs/YYYY-MM-DD/server.log
   */
  SERVER: "server",

  /**
   * 상품 저장소
   */
  STORE: "product-store",

  /**
   * 상품 서비스
   */
  PRODUCT_SERVICE: "product-service",
} as const;
