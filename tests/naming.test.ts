import { describe, expect, test } from "vitest";
import { capitalize, toCamel, toPascal, toSnake } from "../src/generator/naming.js";

describe("naming transforms", () => {
  test("converts snake_case input", () => {
    expect(toPascal("user_profile")).toBe("UserProfile");
    expect(toCamel("user_profile")).toBe("userProfile");
    expect(toSnake("user_profile")).toBe("user_profile");
  });

  test("converts PascalCase and spaced input to snake_case", () => {
    expect(toSnake("UserProfile")).toBe("user_profile");
    expect(toSnake("user profile")).toBe("user_profile");
    expect(toSnake("order-line  item")).toBe("order_line_item");
  });

  test("splits on dashes, underscores and whitespace runs", () => {
    expect(toPascal("order-line  item")).toBe("OrderLineItem");
    expect(toCamel("order-line__item")).toBe("orderLineItem");
  });

  test("capitalizes each word by its first character only", () => {
    expect(capitalize("XML")).toBe("Xml");
    expect(toPascal("XML_parser")).toBe("XmlParser");
    expect(toCamel("XML_parser")).toBe("xmlParser");
    expect(toPascal("userProfile")).toBe("Userprofile");
    expect(toPascal("v2_api")).toBe("V2Api");
  });

  test("returns empty output for empty input", () => {
    expect(toCamel("")).toBe("");
    expect(toPascal("")).toBe("");
    expect(toSnake("")).toBe("");
    expect(capitalize("")).toBe("");
  });

  test("pascal and camel differ only in the first character", () => {
    const inputs = ["auth", "user_profile", "user profile", "XML_parser", "order-line item", "userProfile"];
    inputs.forEach((input) => {
      const pascal = toPascal(input);
      const camel = toCamel(input);
      expect(pascal[0]).toBe(camel[0].toUpperCase());
      expect(pascal.slice(1)).toBe(camel.slice(1));
    });
  });

  test("snake_case keeps underscore runs next to capitals", () => {
    expect(toSnake("My-Name_Thing")).toBe("my__name__thing");
    expect(toPascal("My-Name_Thing")).toBe("MyNameThing");
    expect(toSnake("HTTPServer")).toBe("h_t_t_p_server");
  });

  test("snake_case is idempotent on snake_case input", () => {
    ["auth", "user_profile", "order_line_item"].forEach((input) => {
      expect(toSnake(toSnake(input))).toBe(toSnake(input));
      expect(toSnake(input)).toBe(input);
    });
  });
});
