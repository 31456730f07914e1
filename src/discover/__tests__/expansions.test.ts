import { describe, expect, it } from "vitest";
import { relatedPhrases, synonymVariants } from "../expansions";

describe("synonymVariants", () => {
  it("swaps a known word for each synonym", () => {
    expect(synonymVariants("долг по оплате")).toEqual([
      "задолженность по оплате",
      "задолж по оплате",
      "неоплата по оплате",
    ]);
  });

  it("caps the number of variants and never repeats the query", () => {
    const variants = synonymVariants("тариф и счетчик");

    expect(variants).toEqual(["расценка и счетчик", "ставка и счетчик", "цена и счетчик"]);
    expect(variants).not.toContain("тариф и счетчик");
  });

  it("matches words case-insensitively", () => {
    expect(synonymVariants("Льгота", { льгота: ["скидка"] })).toEqual(["скидка"]);
  });

  it("returns nothing for unknown words", () => {
    expect(synonymVariants("расписание")).toEqual([]);
  });
});

describe("relatedPhrases", () => {
  it("returns the first two related phrases across all words", () => {
    expect(relatedPhrases("тариф и счетчик")).toEqual(["изменение тарифа", "многотарифный учет"]);
  });

  it("returns nothing when no word is known", () => {
    expect(relatedPhrases("")).toEqual([]);
    expect(relatedPhrases("расписание")).toEqual([]);
  });
});
