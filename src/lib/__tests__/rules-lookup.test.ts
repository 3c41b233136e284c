import { describe, it, expect } from "vitest";
import { RulesLookup, answerText, stripHtml } from "../rules-lookup";
import type { RulesDocument } from "@/types/rules";

const document: RulesDocument = {
  questions: [
    {
      id: "flight-plan",
      question: "Is a flight plan required?",
      answers_by_country: { FR: "Yes", GB: "Yes, with a GAR", DE: "" },
    },
    {
      id: "customs",
      question: "Must the first landing be at a customs airport?",
      answers_by_country: {
        FR: { answer_html: "<p>Yes, unless a <b>Schengen</b> flight.</p>" },
        GB: "Yes",
      },
    },
    {
      id: "transponder",
      question: "Is a transponder required?",
      answers_by_country: { DE: "Above 5000 ft" },
    },
    {
      id: "night-vfr",
      question: "Is night VFR permitted?",
      answers_by_country: {
        FR: { answer_html: "Yes, with rating &amp; plan.<br>Check NOTAMs." },
      },
    },
  ],
};

describe("stripHtml", () => {
  it("drops tags and decodes entities", () => {
    expect(stripHtml("<p>A &lt;b&gt; &amp; <i>c</i></p>")).toBe("A <b> & c");
  });

  it("turns line breaks into spaces", () => {
    expect(stripHtml("one<br/>two<br>three")).toBe("one two three");
  });
});

describe("answerText", () => {
  it("trims plain answers", () => {
    expect(answerText("  Yes ")).toBe("Yes");
  });

  it("is empty for a missing answer", () => {
    expect(answerText(undefined)).toBe("");
  });
});

describe("RulesLookup.byCountry", () => {
  const rules = new RulesLookup(document);

  it("returns answered questions in document order", () => {
    expect(rules.byCountry("fr")).toEqual([
      { question: "Is a flight plan required?", answer: "Yes" },
      {
        question: "Must the first landing be at a customs airport?",
        answer: "Yes, unless a Schengen flight.",
      },
      {
        question: "Is night VFR permitted?",
        answer: "Yes, with rating & plan. Check NOTAMs.",
      },
    ]);
  });

  it("skips empty answers", () => {
    expect(rules.byCountry("DE")).toEqual([
      { question: "Is a transponder required?", answer: "Above 5000 ft" },
    ]);
  });

  it("returns nothing for an unknown country", () => {
    expect(rules.byCountry("XX")).toEqual([]);
  });
});

describe("RulesLookup.compare", () => {
  const rules = new RulesLookup(document);

  it("fills a missing side with N/A", () => {
    expect(rules.compare("GB", "DE")).toEqual([
      { question: "Is a flight plan required?", first: "Yes, with a GAR", second: "N/A" },
      {
        question: "Must the first landing be at a customs airport?",
        first: "Yes",
        second: "N/A",
      },
      { question: "Is a transponder required?", first: "N/A", second: "Above 5000 ft" },
    ]);
  });

  it("leaves out questions neither country answers", () => {
    expect(rules.compare("DE", "CH")).toEqual([
      { question: "Is a transponder required?", first: "Above 5000 ft", second: "N/A" },
    ]);
  });
});

describe("RulesLookup.countries", () => {
  it("lists countries with an answer", () => {
    expect(new RulesLookup(document).countries()).toEqual(["DE", "FR", "GB"]);
  });
});
