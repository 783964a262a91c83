import { describe, expect, it } from "vitest";
import {
  ACTION_REQUIRED_RESULT_CODES,
  RESULT_CODES,
  formatPaymentResponse,
  isActionRequired,
  isResultCode,
  shouldCleanStateData,
} from "../src/domain/result-codes.js";

describe("formatPaymentResponse", () => {
  it("returns bare final responses for settled codes", () => {
    expect(formatPaymentResponse("Authorised")).toEqual({ isFinal: true, resultCode: "Authorised" });
    expect(formatPaymentResponse("Refused")).toEqual({ isFinal: true, resultCode: "Refused" });
    expect(formatPaymentResponse("Error")).toEqual({ isFinal: true, resultCode: "Error" });
    expect(formatPaymentResponse("Success")).toEqual({ isFinal: true, resultCode: "Success" });
  });

  it("keeps the action for codes that need shopper interaction", () => {
    const action = { type: "threeDS2", token: "challenge-token" };
    expect(formatPaymentResponse("ChallengeShopper", action)).toEqual({
      isFinal: false,
      resultCode: "ChallengeShopper",
      action,
    });
    expect(formatPaymentResponse("RedirectShopper")).toEqual({
      isFinal: false,
      resultCode: "RedirectShopper",
      action: null,
    });
  });

  it("returns the action as final for PresentToShopper", () => {
    const action = { type: "voucher", reference: "123-456" };
    expect(formatPaymentResponse("PresentToShopper", action, { ignored: true })).toEqual({
      isFinal: true,
      resultCode: "PresentToShopper",
      action,
    });
  });

  it("returns additional data for Received", () => {
    expect(formatPaymentResponse("Received", { type: "redirect" }, { bankName: "Test Bank" })).toEqual({
      isFinal: true,
      resultCode: "Received",
      additionalData: { bankName: "Test Bank" },
    });
  });

  it("matches finality with action-required membership for every known code", () => {
    for (const code of RESULT_CODES) {
      expect(formatPaymentResponse(code).isFinal).toBe(!isActionRequired(code));
    }
  });

  it("maps unknown codes to Error", () => {
    for (const code of ["", "authorised", "Cancelled", "SomethingNew", "Pending "]) {
      expect(formatPaymentResponse(code, { type: "redirect" }, { a: 1 })).toEqual({
        isFinal: true,
        resultCode: "Error",
      });
    }
  });
});

describe("result code predicates", () => {
  it("recognizes exactly the action-required set", () => {
    expect([...ACTION_REQUIRED_RESULT_CODES].sort()).toEqual([
      "ChallengeShopper",
      "IdentifyShopper",
      "Pending",
      "RedirectShopper",
    ]);
    expect(isActionRequired("PresentToShopper")).toBe(false);
    expect(isActionRequired(undefined)).toBe(false);
  });

  it("recognizes gateway result codes", () => {
    expect(isResultCode("Cancelled")).toBe(true);
    expect(isResultCode("Success")).toBe(false);
    expect(isResultCode(42)).toBe(false);
  });

  it("cleans checkout state data only for authorised results", () => {
    expect(shouldCleanStateData("Authorised")).toBe(true);
    expect(shouldCleanStateData("Pending")).toBe(false);
    expect(shouldCleanStateData("Refused")).toBe(false);
  });
});
