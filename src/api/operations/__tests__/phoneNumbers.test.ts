import { describe, expect, test } from "vitest";
import { clientConfigFromEnv, loadEnv } from "../../../config";
import { InvalidPhoneNumberError } from "../../../domain/errors/ValidationError";
import { buildRequest } from "../../buildRequest";
import {
  deleteInboundNumber,
  getInboundDetails,
  listOutboundNumbers,
  purchasePhoneNumber,
  updateInboundDetails,
  uploadInboundNumbers
} from "../phoneNumbers";

const config = clientConfigFromEnv(loadEnv({}));
const auth = { authToken: "test-secret" };

describe("phone numbers", () => {
  test("purchasePhoneNumber", () => {
    const req = buildRequest(purchasePhoneNumber, { ...auth, areaCode: "415", country: "US" }, config);
    expect(req.url).toBe("https://api.bland.ai/v1/phone/purchase");
    expect(req.body).toEqual({ area_code: "415", country: "US" });
  });

  test("listOutboundNumbers", () => {
    expect(buildRequest(listOutboundNumbers, auth, config).url).toBe("https://api.bland.ai/v1/phone/outbound");
  });

  test("number paths are cleaned and encoded", () => {
    const details = buildRequest(getInboundDetails, { ...auth, phoneNumber: "+1 (415) 555-0100" }, config);
    expect(details.url).toBe("https://api.bland.ai/v1/phone/inbound/%2B14155550100");

    const del = buildRequest(deleteInboundNumber, { ...auth, phoneNumber: "+14155550100" }, config);
    expect(del.url).toBe("https://api.bland.ai/v1/phone/inbound/%2B14155550100/delete");
  });

  test("updateInboundDetails carries the number in the body", () => {
    const req = buildRequest(
      updateInboundDetails,
      { ...auth, phoneNumber: "+1 415 555 0100", pathwayId: "pw-1", temperature: 0.3 },
      config
    );
    expect(req.url).toBe("https://api.bland.ai/v1/phone/inbound/update");
    expect(req.body).toEqual({ phone_number: "+14155550100", pathway_id: "pw-1", temperature: 0.3 });
  });

  test("updateInboundDetails checks temperature", () => {
    expect(() =>
      buildRequest(updateInboundDetails, { ...auth, phoneNumber: "+14155550100", temperature: -0.1 }, config)
    ).toThrow("temperature must be between 0 and 1");
  });

  test("uploadInboundNumbers checks every number", () => {
    const req = buildRequest(uploadInboundNumbers, { ...auth, phoneNumbers: ["+14155550100"], task: "t" }, config);
    expect(req.body).toEqual({ phone_numbers: ["+14155550100"], task: "t" });

    try {
      buildRequest(uploadInboundNumbers, { ...auth, phoneNumbers: ["+14155550100", "415"] }, config);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidPhoneNumberError);
      expect(err).toMatchObject({ field: "phone_numbers", value: "415" });
    }
  });
});
