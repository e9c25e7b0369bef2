import { describe, it, expect, vi } from "vitest";
import { buildPrompt, classifyWithAi, createDeepSeekRequester, parseAiResponse } from "../ai";
import { AiClassificationError } from "../errors";
import type { ChangeSet } from "../../types/commit";

const changeSet: ChangeSet = {
  changes: [{ status: "M", path: "src/api/client.ts" }],
  paths: ["src/api/client.ts"],
  diff: "+if (!data) return null;",
};

describe("parseAiResponse", () => {
  it("normalises type and scope", () => {
    const raw = JSON.stringify({ type: " FIX ", scope: "Core API", theme: "修复空指针", intro: "处理空值返回" });

    expect(parseAiResponse(raw)).toEqual({
      type: "fix",
      scope: "core-api",
      theme: "修复空指针",
      intro: "处理空值返回",
    });
  });

  it("falls back to repo when scope is missing", () => {
    const raw = JSON.stringify({ type: "docs", theme: "补充文档", intro: "补充使用说明" });

    expect(parseAiResponse(raw).scope).toBe("repo");
  });

  it("rejects content that is not JSON", () => {
    expect(() => parseAiResponse("type: fix")).toThrow(/^AI returned non-JSON content/);
  });

  it("rejects types outside the taxonomy", () => {
    const raw = JSON.stringify({ type: "feature", scope: "api", theme: "新增接口", intro: "新增接口" });

    expect(() => parseAiResponse(raw)).toThrow(AiClassificationError);
    expect(() => parseAiResponse(raw)).toThrow(/invalid descriptor: type/);
  });

  it("keeps the theme on one line", () => {
    const raw = JSON.stringify({ type: "fix", scope: "api", theme: "修复空指针\n\n处理空值", intro: "第一行\n第二行" });

    expect(parseAiResponse(raw)).toMatchObject({ theme: "修复空指针 处理空值", intro: "第一行\n第二行" });
  });

  it("rejects blank themes", () => {
    const raw = JSON.stringify({ type: "fix", scope: "api", theme: "  ", intro: "说明" });

    expect(() => parseAiResponse(raw)).toThrow(/theme: theme is empty/);
  });
});

describe("buildPrompt", () => {
  it("caps the file list and the diff", () => {
    const paths = Array.from({ length: 40 }, (_, i) => `src/file${i}.ts`);
    const big: ChangeSet = {
      changes: paths.map((path) => ({ status: "A", path })),
      paths,
      diff: "+".repeat(20000),
    };

    const { system, user } = buildPrompt("/work/demo", big);
    const payload = JSON.parse(user);

    expect(system).toContain("feat/fix/refactor/docs/style/test/chore/perf/ci/build/revert");
    expect(payload.repo).toBe("/work/demo");
    expect(payload.changed_files).toHaveLength(30);
    expect(payload.diff).toHaveLength(12000);
    expect(payload.change_counts).toEqual({ added: 40, modified: 0, deleted: 0, renamed: 0 });
  });
});

describe("classifyWithAi", () => {
  it("sends the prompt and parses the reply", async () => {
    const request = vi.fn(async () =>
      JSON.stringify({ type: "fix", scope: "api", theme: "处理空数据", intro: "客户端在数据为空时返回 null" })
    );

    const descriptor = await classifyWithAi("/work/demo", changeSet, request);

    expect(request).toHaveBeenCalledWith(buildPrompt("/work/demo", changeSet));
    expect(descriptor).toEqual({
      type: "fix",
      scope: "api",
      theme: "处理空数据",
      intro: "客户端在数据为空时返回 null",
    });
  });

  it("wraps transport failures", async () => {
    const request = vi.fn(async (): Promise<string> => {
      throw new Error("Request timed out.");
    });

    await expect(classifyWithAi("/work/demo", changeSet, request)).rejects.toThrow(
      "DeepSeek request failed: Request timed out."
    );
  });
});

describe("createDeepSeekRequester", () => {
  it("refuses to start without an API key", () => {
    expect(() =>
      createDeepSeekRequester({
        enabled: true,
        required: false,
        model: "deepseek-chat",
        baseUrl: "https://api.deepseek.com",
        timeoutSeconds: 30,
      })
    ).toThrow("DEEPSEEK_API_KEY is not set");
  });
});
