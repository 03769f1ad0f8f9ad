import { describe, expect, test } from "vitest";
import { ValidationError } from "../../lib/address/errors";
import { cleanNotation, detectNotation, formatNotation, isValidNotation, parseNotation } from "../../lib/address/mac/notation";

describe("MAC Address notation", () => {
    test("detectNotation", () => {
        expect(detectNotation("a0b1c2d3e4f5")).eq("plain");
        expect(detectNotation("A0-B1-C2-D3-E4-F5")).eq("hyphen");
        expect(detectNotation("a0:b1:c2:d3:e4:f5")).eq("colon");
        expect(detectNotation("A0B1.c2d3.E4F5")).eq("dot");

        expect(detectNotation("a0b1-c2d3-e4f5")).undefined;
        expect(detectNotation("a0:b1:c2:d3:e4:f5\n")).undefined;
        expect(detectNotation("a0.b1.c2.d3.e4.f5")).undefined;
    })

    test("isValidNotation", () => {
        expect(isValidNotation("0a1b2c3d4e5f")).true;
        expect(isValidNotation("0a1b2c3d4e5")).false;
        expect(isValidNotation(0x0a1b2c3d4e5f)).false;
        expect(isValidNotation(undefined)).false;
    })

    test("cleanNotation", () => {
        expect(cleanNotation("A0-B1:C2.D3 E4F5")).eq("a0b1c2d3e4f5");
        expect(cleanNotation("xyz")).eq("");
    })

    test("parseNotation", () => {
        expect(parseNotation("A0B1.C2D3.E4F5")).eq("a0b1c2d3e4f5");
        expect(parseNotation("0A:1B:2C:3D:4E:5F")).eq("0a1b2c3d4e5f");

        expect(() => parseNotation("a0-b1-c2-d3-e4-f5-")).toThrow(ValidationError);
        expect(() => parseNotation("a0b1c2d3e4fz")).toThrow("Pass in 12 hexadecimal digits.");
    })

    test("formatNotation", () => {
        let digits = "0180c2000000";

        expect(formatNotation(digits, "plain")).eq("0180c2000000");
        expect(formatNotation(digits, "hyphen")).eq("01-80-c2-00-00-00");
        expect(formatNotation(digits, "colon")).eq("01:80:c2:00:00:00");
        expect(formatNotation(digits, "dot")).eq("0180.c200.0000");
    })
})
