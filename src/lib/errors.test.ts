import { describe, expect, test } from "vitest";
import {
  IdentityDirectoryError,
  ReviewHostError,
  SlackDeliveryError,
  classifyFailure,
  errorMessage,
} from "./errors.ts";

describe("classifyFailure", () => {
  test("maps each error type to its source", () => {
    expect(classifyFailure(new ReviewHostError("query failed", 500))).toBe("review_host");
    expect(classifyFailure(new SlackDeliveryError("delivery failed", 404))).toBe("slack");
    expect(classifyFailure(new IdentityDirectoryError("no csv"))).toBe("identity_directory");
  });

  test("anything else is internal", () => {
    expect(classifyFailure(new TypeError("boom"))).toBe("internal");
    expect(classifyFailure("boom")).toBe("internal");
  });
});

describe("errorMessage", () => {
  test("uses the message of Error instances", () => {
    expect(errorMessage(new SlackDeliveryError("Error sending Slack message: 500", 500))).toBe(
      "Error sending Slack message: 500",
    );
  });

  test("stringifies other values", () => {
    expect(errorMessage(42)).toBe("42");
  });
});

describe("error classes", () => {
  test("keep the status they were raised with", () => {
    const error = new ReviewHostError("Bitbucket pull request query failed: 401", 401);
    expect(error.name).toBe("ReviewHostError");
    expect(error.status).toBe(401);
  });

  test("identity directory error keeps its cause", () => {
    const cause = new Error("ENOENT");
    expect(new IdentityDirectoryError("no csv", { cause }).cause).toBe(cause);
  });
});
