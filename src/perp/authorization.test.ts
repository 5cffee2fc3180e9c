import { describe, it, expect } from "vitest";
import { AllowListAuthorization } from "./authorization.js";

describe("AllowListAuthorization", () => {
  it("authorizes granted principals until revoked", async () => {
    const auth = new AllowListAuthorization(["alice"]);
    await expect(auth.require("alice")).resolves.toBeUndefined();
    await expect(auth.require("bob")).rejects.toMatchObject({ code: "Unauthorized", principal: "bob" });

    auth.grant("bob");
    auth.revoke("alice");

    await expect(auth.require("bob")).resolves.toBeUndefined();
    await expect(auth.require("alice")).rejects.toMatchObject({ code: "Unauthorized" });
  });
});
