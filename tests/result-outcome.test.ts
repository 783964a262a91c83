import { describe, expect, it } from "vitest";
import {
  BANK_TRANSFER_PENDING_NOTE,
  DIRECT_DEBIT_PENDING_NOTE,
  GENERIC_PENDING_NOTE,
  describePaymentMethod,
  formatAuditComment,
  planPaymentResult,
  resolveResultOutcome,
} from "../src/domain/result-outcome.js";

describe("resolveResultOutcome", () => {
  it("maps result codes to outcomes", () => {
    expect(resolveResultOutcome("Authorised", "visa")).toEqual({ kind: "authorised", success: true });
    expect(resolveResultOutcome("RedirectShopper", "ideal")).toEqual({ kind: "action_required", success: true });
    expect(resolveResultOutcome("IdentifyShopper", "visa")).toEqual({ kind: "action_required", success: true });
    expect(resolveResultOutcome("ChallengeShopper", "visa")).toEqual({ kind: "action_required", success: true });
    expect(resolveResultOutcome("PresentToShopper", "boleto")).toEqual({ kind: "action_required", success: true });
    expect(resolveResultOutcome("Refused", "visa")).toEqual({ kind: "refused", success: false });
    expect(resolveResultOutcome("Cancelled", "visa")).toEqual({ kind: "refused", success: false });
    expect(resolveResultOutcome("Error", "visa")).toEqual({ kind: "unrecognized", success: false });
    expect(resolveResultOutcome(undefined, "visa")).toEqual({ kind: "unrecognized", success: false });
  });

  it("fails Received only for alipay_hk methods", () => {
    expect(resolveResultOutcome("Received", "alipay_hk_sometype")).toEqual({ kind: "received", success: false });
    expect(resolveResultOutcome("Received", "ideal")).toEqual({ kind: "received", success: true });
  });

  it("picks the pending note from the payment method", () => {
    expect(resolveResultOutcome("Pending", "bankTransfer_IBAN")).toEqual({
      kind: "pending",
      success: true,
      note: BANK_TRANSFER_PENDING_NOTE,
    });
    expect(resolveResultOutcome("Pending", "sepadirectdebit")).toEqual({
      kind: "pending",
      success: true,
      note: DIRECT_DEBIT_PENDING_NOTE,
    });
    expect(resolveResultOutcome("Pending", "sepadirectdebit_amazonpay")).toEqual({
      kind: "pending",
      success: true,
      note: GENERIC_PENDING_NOTE,
    });
  });
});

describe("planPaymentResult", () => {
  it("formats the audit comment", () => {
    expect(
      formatAuditComment({
        resultCode: "Authorised",
        authResult: "Authorised",
        pspReference: "PSP0001",
        paymentMethod: "visa",
      }),
    ).toBe("Payment details response: <br /> authResult: Authorised <br /> pspReference: PSP0001 <br /> paymentMethod: visa");
  });

  it("appends the pending note to the comment", () => {
    const plan = planPaymentResult({
      resultCode: "Pending",
      authResult: "Pending",
      pspReference: "",
      paymentMethod: "bankTransfer_NL",
    });
    expect(plan.outcome.success).toBe(true);
    expect(plan.comment).toBe(
      "Payment details response: <br /> authResult: Pending <br /> pspReference:  <br /> paymentMethod: bankTransfer_NL"
        + "<br /><br />Waiting for the customer to transfer the money.",
    );
  });

  it("leaves other comments without a note", () => {
    const plan = planPaymentResult({
      resultCode: "Refused",
      authResult: "Refused",
      pspReference: "PSP0002",
      paymentMethod: "mc",
    });
    expect(plan.outcome).toEqual({ kind: "refused", success: false });
    expect(plan.comment).toBe("Payment details response: <br /> authResult: Refused <br /> pspReference: PSP0002 <br /> paymentMethod: mc");
  });
});

describe("describePaymentMethod", () => {
  it("prefers brand over type", () => {
    expect(describePaymentMethod({ paymentMethod: { brand: "applepay", type: "scheme" } })).toBe("applepay");
    expect(describePaymentMethod({ paymentMethod: { type: "ideal" } })).toBe("ideal");
    expect(describePaymentMethod({})).toBe("");
  });
});
