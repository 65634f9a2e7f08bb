/**
 * Tests for the template library and its Handlebars helpers.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { pathToFileURL } from "node:url";
import { TemplateLibrary, resolveTemplatesDir } from "../src/core/render/TemplateLibrary.js";
import { TemplateNotFoundError, TemplateRenderError } from "../src/core/errors/errors.js";
import { fullConfig } from "./helpers/testUtils.js";

describe("TemplateLibrary", () => {
  describe("fromSources", () => {
    it("renders without HTML escaping", () => {
      const templates = TemplateLibrary.fromSources({ greet: "value = \"{{text}}\" <{{tag}}>" });

      expect(templates.render("greet", { text: "a & b", tag: "x" })).toBe('value = "a & b" <x>');
    });

    it("renders missing values as empty", () => {
      const templates = TemplateLibrary.fromSources({ t: "[{{missing}}]" });

      expect(templates.render("t", {})).toBe("[]");
    });

    it("lists template names sorted", () => {
      const templates = TemplateLibrary.fromSources({ "b/x": "", "a/y": "" });

      expect(templates.names()).toEqual(["a/y", "b/x"]);
      expect(templates.has("a/y")).toBe(true);
      expect(templates.has("a/z")).toBe(false);
    });
  });

  describe("helpers", () => {
    const templates = TemplateLibrary.fromSources({
      eq: "{{#if (eq database \"mysql\")}}yes{{else}}no{{/if}}",
      and: "{{#if (and hasAuth refreshToken)}}both{{/if}}",
      or: "{{#if (or cors docker)}}any{{/if}}",
      not: "{{#if (not testing)}}off{{/if}}",
      casing: "{{upper name}} {{lower name}} {{snake name}}",
    });

    it("compares values", () => {
      expect(templates.render("eq", { database: "mysql" })).toBe("yes");
      expect(templates.render("eq", { database: "postgresql" })).toBe("no");
    });

    it("combines booleans", () => {
      expect(templates.render("and", { hasAuth: true, refreshToken: true })).toBe("both");
      expect(templates.render("and", { hasAuth: true, refreshToken: false })).toBe("");
      expect(templates.render("or", { cors: false, docker: true })).toBe("any");
      expect(templates.render("not", { testing: false })).toBe("off");
    });

    it("changes case", () => {
      expect(templates.render("casing", { name: "Orders-Api" })).toBe("ORDERS-API orders-api orders_api");
    });
  });

  describe("errors", () => {
    it("fails with TEMPLATE_NOT_FOUND for an unknown name", () => {
      const templates = TemplateLibrary.fromSources({});

      expect(() => templates.render("app/missing.py", {})).toThrow(TemplateNotFoundError);
      expect(() => templates.render("app/missing.py", {})).toThrow("Template not found: app/missing.py");
    });

    it("fails with TEMPLATE_RENDER_FAILED on a syntax error", () => {
      const templates = TemplateLibrary.fromSources({ broken: "{{#if x}}unclosed" });

      expect(() => templates.render("broken", { x: true })).toThrow(TemplateRenderError);
    });

    it("fails with TEMPLATE_RENDER_FAILED on an unknown helper", () => {
      const templates = TemplateLibrary.fromSources({ broken: "{{shout name}}" });

      expect(() => templates.render("broken", {})).toThrow("Failed to render template: broken");
    });
  });

  describe("bundled templates", () => {
    it("locates the templates directory from the package root", () => {
      const fromModule = pathToFileURL(path.resolve("src/core/render/TemplateLibrary.ts")).href;

      expect(resolveTemplatesDir(fromModule)).toBe(path.resolve("templates"));
    });

    it("loads and renders every bundled template", async () => {
      const templates = await TemplateLibrary.load();
      const data = fullConfig().toTemplateData();

      expect(templates.names()).toContain("app/main.py");
      expect(templates.names()).toContain("deploy/Dockerfile");
      for (const name of templates.names()) {
        expect(() => templates.render(name, data)).not.toThrow();
      }
    });
  });
});
