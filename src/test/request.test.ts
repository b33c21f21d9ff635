import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  parsePassphraseRequest,
  parseComplexRequest,
  resolveCapitalization,
  DEFAULT_WORD_COUNT,
} from "../core/request.js";
import { ConfigError } from "../core/errors.js";

describe("request", () => {
  describe("parsePassphraseRequest", () => {
    it("fills in defaults", () => {
      const request = parsePassphraseRequest({});
      assert.equal(request.wordCount, DEFAULT_WORD_COUNT);
      assert.equal(request.separator, "-");
      assert.equal(request.capitalization, "none");
      assert.equal(request.digits, 0);
      assert.equal(request.minLength, undefined);
      assert.equal(request.syllables, undefined);
    });

    it("coerces numeric strings from the command line", () => {
      const request = parsePassphraseRequest({
        wordCount: "6",
        digits: "2",
        minLength: "20",
        syllables: "2",
      });
      assert.equal(request.wordCount, 6);
      assert.equal(request.digits, 2);
      assert.equal(request.minLength, 20);
      assert.equal(request.syllables, 2);
    });

    it("rejects a zero word count", () => {
      assert.throws(() => parsePassphraseRequest({ wordCount: 0 }), {
        name: "ConfigError",
        message: "Invalid wordCount: Word count must be at least 1",
      });
    });

    it("rejects a negative word count", () => {
      assert.throws(() => parsePassphraseRequest({ wordCount: "-3" }), {
        name: "ConfigError",
        message: "Invalid wordCount: Word count must be at least 1",
      });
    });

    it("rejects a fractional word count", () => {
      assert.throws(() => parsePassphraseRequest({ wordCount: 2.5 }), {
        message: "Invalid wordCount: Word count must be an integer",
      });
    });

    it("rejects a non-numeric word count", () => {
      assert.throws(() => parsePassphraseRequest({ wordCount: "four" }), ConfigError);
    });

    it("rejects separators with letters or digits", () => {
      assert.throws(() => parsePassphraseRequest({ separator: "a" }), {
        message: "Invalid separator: Separator cannot contain letters or digits",
      });
      assert.throws(() => parsePassphraseRequest({ separator: "7" }), ConfigError);
    });

    it("rejects an empty separator", () => {
      assert.throws(() => parsePassphraseRequest({ separator: "" }), {
        name: "ConfigError",
        message: "Invalid separator: Separator cannot be empty",
      });
    });

    it("accepts whitespace and punctuation separators", () => {
      assert.equal(parsePassphraseRequest({ separator: " " }).separator, " ");
      assert.equal(parsePassphraseRequest({ separator: "_." }).separator, "_.");
    });

    it("rejects a negative digit count", () => {
      assert.throws(() => parsePassphraseRequest({ digits: -1 }), {
        message: "Invalid digits: Digit count cannot be negative",
      });
    });
  });

  describe("parseComplexRequest", () => {
    it("defaults minLength to 10", () => {
      assert.equal(parseComplexRequest({}).minLength, 10);
    });

    it("rejects a minLength below 4", () => {
      assert.throws(() => parseComplexRequest({ minLength: "3" }), {
        name: "ConfigError",
        message: "Invalid minLength: Minimum length must be at least 4",
      });
    });
  });

  describe("resolveCapitalization", () => {
    it("maps flags to a mode", () => {
      assert.equal(resolveCapitalization({}), "none");
      assert.equal(resolveCapitalization({ capitalize: true }), "all");
      assert.equal(resolveCapitalization({ randomCase: true }), "random");
    });

    it("rejects both flags together", () => {
      assert.throws(() => resolveCapitalization({ capitalize: true, randomCase: true }), {
        name: "ConfigError",
        message: "--capitalize and --random-case cannot be combined",
      });
    });
  });
});
