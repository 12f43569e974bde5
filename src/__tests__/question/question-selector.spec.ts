import { describe, expect, it, vi } from "vitest";
import { ExhaustedSourceError, NoProviderConfiguredError } from "../../errors";
import { drawQuestion, selectProvider } from "../../modules/question/question-selector";
import { question, StubProvider } from "../helpers/fakes";

describe("selectProvider", () => {
  const providers = [new StubProvider("a"), new StubProvider("b"), new StubProvider("c")];

  it("maps the random draw onto the provider list", () => {
    expect(selectProvider(providers, () => 0).getSourceName()).toBe("a");
    expect(selectProvider(providers, () => 0.5).getSourceName()).toBe("b");
    expect(selectProvider(providers, () => 0.99).getSourceName()).toBe("c");
  });

  it("never indexes past the end", () => {
    expect(selectProvider(providers, () => 1).getSourceName()).toBe("c");
  });

  it("requires at least one provider", () => {
    expect(() => selectProvider([], () => 0)).toThrow(NoProviderConfiguredError);
  });
});

describe("drawQuestion", () => {
  it("falls back to another provider when one is exhausted", async () => {
    const empty = new StubProvider("empty");
    empty.draw.mockRejectedValue(new ExhaustedSourceError("empty"));
    const full = new StubProvider("full");
    full.draw.mockResolvedValue(question("Lisbon"));
    const onExhausted = vi.fn();

    const drawn = await drawQuestion([empty, full], () => 0, onExhausted);

    expect(drawn.provider).toBe(full);
    expect(drawn.question.answer).toBe("Lisbon");
    expect(onExhausted).toHaveBeenCalledTimes(1);
  });

  it("throws the last exhaustion when every provider is exhausted", async () => {
    const first = new StubProvider("first");
    first.draw.mockRejectedValue(new ExhaustedSourceError("first"));
    const second = new StubProvider("second");
    second.draw.mockRejectedValue(new ExhaustedSourceError("second"));

    await expect(drawQuestion([first, second], () => 0)).rejects.toMatchObject({
      sourceName: "second",
    });
  });

  it("does not swallow other failures", async () => {
    const broken = new StubProvider("broken");
    broken.draw.mockRejectedValue(new Error("boom"));
    const full = new StubProvider("full");

    await expect(drawQuestion([broken, full], () => 0)).rejects.toThrow("boom");
    expect(full.draw).not.toHaveBeenCalled();
  });

  it("rejects an empty provider set", async () => {
    await expect(drawQuestion([], () => 0)).rejects.toBeInstanceOf(NoProviderConfiguredError);
  });
});
