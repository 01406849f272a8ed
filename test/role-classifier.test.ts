import { describe, it, expect } from "vitest";
import {
  classifyClass,
  classifyFunction,
  DEFAULT_RULE_TABLES,
  toSnakeCase,
} from "../src/role-classifier.js";
import type { RuleTables } from "../src/types.js";

describe("toSnakeCase", () => {
  it("splits camel and Pascal case", () => {
    expect(toSnakeCase("getUserName")).toBe("get_user_name");
    expect(toSnakeCase("HTTPServer")).toBe("http_server");
    expect(toSnakeCase("buildURL")).toBe("build_url");
    expect(toSnakeCase("already_snake")).toBe("already_snake");
  });
});

describe("classifyFunction", () => {
  it("recognizes dunder methods", () => {
    expect(classifyFunction("__init__")).toBe("Dunder");
    expect(classifyFunction("__repr__")).toBe("Dunder");
  });

  it("does not treat bare underscores as dunder", () => {
    expect(classifyFunction("__")).toBe("Private");
    expect(classifyFunction("____")).toBe("Private");
  });

  it("recognizes entry points by name and by decorator", () => {
    expect(classifyFunction("main")).toBe("Entry_Point");
    expect(classifyFunction("cli", ["click.command"])).toBe("Entry_Point");
    expect(classifyFunction("tools", ["app.group"])).toBe("Entry_Point");
    expect(classifyFunction("route", ["app.get"])).toBe("General");
  });

  it("puts the underscore rule ahead of verb prefixes", () => {
    expect(classifyFunction("_helper")).toBe("Private");
    expect(classifyFunction("_get_value")).toBe("Private");
  });

  it("matches verb prefixes on word boundaries", () => {
    expect(classifyFunction("get_user")).toBe("Getter");
    expect(classifyFunction("GetUser")).toBe("Getter");
    expect(classifyFunction("fetchAll")).toBe("Getter");
    expect(classifyFunction("getter")).toBe("General");
    expect(classifyFunction("load")).toBe("General");
    expect(classifyFunction("update_record")).toBe("Setter");
    expect(classifyFunction("writeFile")).toBe("Setter");
    expect(classifyFunction("make_widget")).toBe("Creator");
    expect(classifyFunction("buildURL")).toBe("Creator");
    expect(classifyFunction("transform_rows")).toBe("Processor");
    expect(classifyFunction("compute_total")).toBe("General");
  });

  it("is deterministic", () => {
    const names = ["main", "_x", "get_a", "set_b", "create_c", "process_d", "other"];
    const first = names.map((n) => classifyFunction(n));
    const second = names.map((n) => classifyFunction(n));
    expect(second).toEqual(first);
  });
});

describe("classifyClass", () => {
  const facts = (
    name: string,
    bases: string[] = [],
    docstring: string | null = null,
    methods: string[] = [],
  ) => ({ name, bases, docstring, methods });

  it("classifies by name keyword", () => {
    expect(classifyClass(facts("UserModel"))).toBe("Model");
    expect(classifyClass(facts("OrderEntity"))).toBe("Entity");
    expect(classifyClass(facts("ReportGenerator"))).toBe("Generator");
    expect(classifyClass(facts("SessionManager"))).toBe("Service");
  });

  it("checks the name before bases and docstring", () => {
    expect(classifyClass(facts("DataAnalyzer", ["BaseModel"], "A data pipeline."))).toBe("Analyzer");
  });

  it("falls back to bases, then the docstring", () => {
    expect(classifyClass(facts("Thing", ["pydantic.BaseModel"]))).toBe("Model");
    expect(classifyClass(facts("Plain", [], "Coordinates the build pipeline."))).toBe("Pipeline");
    expect(classifyClass(facts("Plain", [], "Nothing to see."))).toBe("General");
  });

  it("follows table order when a name has several keywords", () => {
    expect(classifyClass(facts("ServiceModel"))).toBe("Service");
  });

  it("has no underscore rule for classes", () => {
    expect(classifyClass(facts("_Hidden"))).toBe("General");
  });
});

describe("custom rule tables", () => {
  const tables: RuleTables = {
    version: "custom-1",
    functions: [{ category: "Processor", match: { type: "prefix", prefixes: ["handle"] } }],
    classes: [{ category: "Entity", source: "methods", keywords: ["persist"] }],
  };

  it("replaces the default function rules", () => {
    expect(classifyFunction("handle_event", [], tables)).toBe("Processor");
    expect(classifyFunction("get_value", [], tables)).toBe("General");
  });

  it("can classify classes by method names", () => {
    expect(classifyClass({ name: "Thing", bases: [], methods: ["persist"], docstring: null }, tables)).toBe(
      "Entity",
    );
  });

  it("leaves the defaults untouched", () => {
    expect(DEFAULT_RULE_TABLES.version).toBe("1");
    expect(classifyFunction("get_value")).toBe("Getter");
  });
});
