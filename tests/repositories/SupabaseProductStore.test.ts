/**
 * SupabaseProductStore 단위 테스트
 *
 * PostgREST 호출은 체이닝 가능한 가짜 쿼리 빌더로 대체
 * 각 from() 호출은 큐에 넣어둔 응답을 순서대로 반환
 */

import { describe, it, expect, beforeEach, jest } from "@jest/globals";
import { SupabaseClient } from "@supabase/supabase-js";
import { SupabaseProductStore } from "@/repositories/SupabaseProductStore";
import { StorageUnavailableError } from "@/core/errors/ProductError";
import { DEFAULT_SORT } from "@/services/PaginationEngine";

interface FakeResponse {
  data?: unknown;
  error?: { message: string; code: string } | null;
  count?: number | null;
}

type Call = [method: string, args: unknown[]];

class FakeQueryBuilder implements PromiseLike<FakeResponse> {
  readonly calls: Call[] = [];

  constructor(
    readonly relation: string,
    private readonly response: FakeResponse | Error,
  ) {}

  private record(method: string, args: unknown[]): this {
    this.calls.push([method, args]);
    return this;
  }

  select(...args: unknown[]): this {
    return this.record("select", args);
  }
  insert(...args: unknown[]): this {
    return this.record("insert", args);
  }
  update(...args: unknown[]): this {
    return this.record("update", args);
  }
  delete(...args: unknown[]): this {
    return this.record("delete", args);
  }
  eq(...args: unknown[]): this {
    return this.record("eq", args);
  }
  order(...args: unknown[]): this {
    return this.record("order", args);
  }
  range(...args: unknown[]): this {
    return this.record("range", args);
  }
  limit(...args: unknown[]): this {
    return this.record("limit", args);
  }
  single(): this {
    return this.record("single", []);
  }
  maybeSingle(): this {
    return this.record("maybeSingle", []);
  }

  then<TResult1 = FakeResponse, TResult2 = never>(
    onfulfilled?: ((value: FakeResponse) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): PromiseLike<TResult1 | TResult2> {
    const settled: Promise<FakeResponse> =
      this.response instanceof Error
        ? Promise.reject(this.response)
        : Promise.resolve({ error: null, count: null, ...this.response });
    return settled.then(onfulfilled, onrejected);
  }
}

class FakeSupabaseClient {
  readonly queries: FakeQueryBuilder[] = [];
  private readonly responses: Array<FakeResponse | Error> = [];
  readonly removeAllChannels = jest.fn(async () => []);

  enqueue(...responses: Array<FakeResponse | Error>): void {
    this.responses.push(...responses);
  }

  from(relation: string): FakeQueryBuilder {
    const response = this.responses.shift();
    if (response === undefined) {
      throw new Error(`no response queued for ${relation}`);
    }
    const query = new FakeQueryBuilder(relation, response);
    this.queries.push(query);
    return query;
  }

  lastCalls(): Call[] {
    const last = this.queries[this.queries.length - 1];
    return last ? last.calls : [];
  }
}

function asClient(fake: FakeSupabaseClient): SupabaseClient {
  return fake as unknown as SupabaseClient;
}

describe("SupabaseProductStore", () => {
  let fake: FakeSupabaseClient;
  let store: SupabaseProductStore;

  beforeEach(async () => {
    fake = new FakeSupabaseClient();
    store = new SupabaseProductStore(asClient(fake), {
      tableName: "products",
      categoryViewName: "product_categories",
    });
    fake.enqueue({ count: 0 }, { count: 0 });
    await store.init();
  });

  describe("init()", () => {
    it("테이블과 뷰를 모두 확인", () => {
      expect(fake.queries.map((q) => q.relation)).toEqual([
        "products",
        "product_categories",
      ]);
    });

    it("스키마가 없으면 StorageUnavailableError", async () => {
      const other = new FakeSupabaseClient();
      other.enqueue({ error: { message: "relation does not exist", code: "42P01" } });
      const broken = new SupabaseProductStore(asClient(other));

      await expect(broken.init()).rejects.toThrow(
        "storage unavailable (init): relation does not exist",
      );
      expect(await broken.healthCheck()).toBe(false);
    });

    it("init() 전 호출은 요청 없이 거부", async () => {
      const other = new FakeSupabaseClient();
      const fresh = new SupabaseProductStore(asClient(other));

      await expect(fresh.findById(1)).rejects.toThrow(
        "storage unavailable (findById): store is not initialized",
      );
      expect(other.queries).toHaveLength(0);
    });
  });

  describe("insert()", () => {
    it("저장 후 행을 스냅샷으로 반환", async () => {
      fake.enqueue({ data: { id: 7, category: "가구", name: "책상" } });

      const product = await store.insert("가구", "책상");

      expect(product).toEqual({ id: 7, category: "가구", name: "책상" });
      expect(Object.isFrozen(product)).toBe(true);
      expect(fake.lastCalls()).toEqual([
        ["insert", [{ category: "가구", name: "책상" }]],
        ["select", ["id, category, name"]],
        ["single", []],
      ]);
    });

    it("형식이 잘못된 행은 StorageUnavailableError", async () => {
      fake.enqueue({ data: { id: "abc", category: "가구" } });

      await expect(store.insert("가구", "책상")).rejects.toThrow(
        "storage unavailable (insert): malformed product row",
      );
    });
  });

  describe("findById()", () => {
    it("행이 없으면 NOT_FOUND 표식", async () => {
      fake.enqueue({ data: null });

      expect(await store.findById(5)).toEqual({
        success: false,
        error: { type: "NOT_FOUND", id: 5 },
      });
      expect(fake.lastCalls()).toEqual([
        ["select", ["id, category, name"]],
        ["eq", ["id", 5]],
        ["maybeSingle", []],
      ]);
    });

    it("행이 있으면 성공", async () => {
      fake.enqueue({ data: { id: 5, category: "가구", name: "책상" } });

      expect(await store.findById(5)).toEqual({
        success: true,
        data: { id: 5, category: "가구", name: "책상" },
      });
    });

    it("fetch 실패(타임아웃)는 NotFound가 아닌 StorageUnavailableError", async () => {
      fake.enqueue(new Error("The operation was aborted due to timeout"));

      const error = await store.findById(5).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StorageUnavailableError);
      expect(error).toHaveProperty(
        "message",
        "storage unavailable (findById): The operation was aborted due to timeout",
      );
    });
  });

  describe("replace()", () => {
    it("한 번의 update 요청으로 두 필드 교체", async () => {
      fake.enqueue({ data: { id: 3, category: "사무용품", name: "의자" } });

      const result = await store.replace(3, "사무용품", "의자");

      expect(result).toEqual({
        success: true,
        data: { id: 3, category: "사무용품", name: "의자" },
      });
      expect(fake.queries).toHaveLength(3);
      expect(fake.lastCalls()).toEqual([
        ["update", [{ category: "사무용품", name: "의자" }]],
        ["eq", ["id", 3]],
        ["select", ["id, category, name"]],
        ["maybeSingle", []],
      ]);
    });

    it("대상이 없으면 NOT_FOUND 표식", async () => {
      fake.enqueue({ data: null });

      expect(await store.replace(3, "a", "b")).toEqual({
        success: false,
        error: { type: "NOT_FOUND", id: 3 },
      });
    });
  });

  describe("deleteById()", () => {
    it("삭제된 행이 있으면 성공", async () => {
      fake.enqueue({ data: [{ id: 4 }] });

      expect(await store.deleteById(4)).toEqual({ success: true, data: undefined });
      expect(fake.lastCalls()).toEqual([
        ["delete", []],
        ["eq", ["id", 4]],
        ["select", ["id"]],
      ]);
    });

    it("삭제된 행이 없으면 NOT_FOUND 표식", async () => {
      fake.enqueue({ data: [] });

      expect(await store.deleteById(4)).toEqual({
        success: false,
        error: { type: "NOT_FOUND", id: 4 },
      });
    });
  });

  describe("queryByCategory()", () => {
    it("목록과 exact count를 한 요청으로 조회", async () => {
      fake.enqueue({
        data: [
          { id: 1, category: "전자제품", name: "노트북" },
          { id: 3, category: "전자제품", name: "마우스" },
        ],
        count: 5,
      });

      const result = await store.queryByCategory("전자제품", 1, 2, DEFAULT_SORT);

      expect(result).toEqual({
        items: [
          { id: 1, category: "전자제품", name: "노트북" },
          { id: 3, category: "전자제품", name: "마우스" },
        ],
        totalPages: 3,
        totalElements: 5,
        page: 1,
      });
      expect(fake.lastCalls()).toEqual([
        ["select", ["id, category, name", { count: "exact" }]],
        ["eq", ["category", "전자제품"]],
        ["order", ["id", { ascending: true }]],
        ["range", [2, 3]],
      ]);
    });

    it("필터 미지정 시 eq 없이 조회", async () => {
      fake.enqueue({ data: [], count: 0 });

      await store.queryByCategory(undefined, 0, 10, DEFAULT_SORT);

      expect(fake.lastCalls().map(([method]) => method)).toEqual([
        "select",
        "order",
        "range",
      ]);
    });

    it("마지막 페이지 이후(PGRST103)는 건수만 다시 조회", async () => {
      fake.enqueue(
        { error: { message: "Requested range not satisfiable", code: "PGRST103" } },
        { count: 2 },
      );

      const result = await store.queryByCategory("전자제품", 5, 1, DEFAULT_SORT);

      expect(result).toEqual({ items: [], totalPages: 2, totalElements: 2, page: 5 });
      expect(fake.lastCalls()).toEqual([
        ["select", ["id", { count: "exact", head: true }]],
        ["eq", ["category", "전자제품"]],
      ]);
    });

    it("그 외 쿼리 에러는 StorageUnavailableError", async () => {
      fake.enqueue({ error: { message: "permission denied", code: "42501" } });

      await expect(
        store.queryByCategory(undefined, 0, 10, DEFAULT_SORT),
      ).rejects.toThrow("storage unavailable (queryByCategory): permission denied");
    });
  });

  describe("distinctCategories()", () => {
    it("뷰에서 최초 등록 순으로 조회", async () => {
      fake.enqueue({ data: [{ category: "전자제품" }, { category: "가구" }] });

      expect(await store.distinctCategories()).toEqual(["전자제품", "가구"]);
      expect(fake.queries[fake.queries.length - 1]?.relation).toBe("product_categories");
      expect(fake.lastCalls()).toEqual([
        ["select", ["category"]],
        ["order", ["first_id", { ascending: true }]],
      ]);
    });
  });

  describe("healthCheck() / close()", () => {
    it("쿼리 에러면 false", async () => {
      fake.enqueue({ error: { message: "connection refused", code: "08006" } });

      expect(await store.healthCheck()).toBe(false);
    });

    it("정상 응답이면 true", async () => {
      fake.enqueue({ data: [] });

      expect(await store.healthCheck()).toBe(true);
    });

    it("close() 후 호출은 요청 없이 거부", async () => {
      await store.close();
      const before = fake.queries.length;

      await expect(store.distinctCategories()).rejects.toThrow(
        "storage unavailable (distinctCategories): store is closed",
      );
      expect(fake.queries).toHaveLength(before);
      expect(fake.removeAllChannels).toHaveBeenCalledTimes(1);
      expect(await store.healthCheck()).toBe(false);
    });
  });
});
