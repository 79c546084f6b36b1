import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { OpenApiCollector, toValidationSchema } from "../../src/openapi/collector.js";
import { Dispatcher } from "../../src/rpc/dispatcher.js";
import { RegistrationError } from "../../src/rpc/errors.js";
import { payload } from "../../src/rpc/payload.js";
import { MethodRegistry } from "../../src/rpc/registry.js";
import { UseCase } from "../../src/rpc/usecase.js";
import { JsonSchemaValidator } from "../../src/validation/jsonSchemaValidator.js";

const EchoInput = payload(z.object({ a: z.string(), b: z.number() }));
const EchoOutput = payload(z.object({ b: z.number(), a: z.string() }), {
  create: () => ({ b: 0, a: "" }),
  name: "Echoed",
});

function echo(): UseCase<{ a: string; b: number }, { b: number; a: string }> {
  return new UseCase({
    name: "echo",
    title: "Echo",
    description: "Returns its parameters",
    tags: ["demo"],
    input: EchoInput,
    output: EchoOutput,
    interact: async (_ctx, input, output) => {
      output.a = input.a;
      output.b = input.b;
    },
  });
}

describe("openapi collector", () => {
  it("documents every method as a POST operation", () => {
    const collector = new OpenApiCollector({ info: { title: "Demo", version: "1.2.3" } });
    const registry = new MethodRegistry({ collectors: [collector] });
    registry.add(echo());

    const document = collector.document();

    expect(document.openapi).to.equal("3.0.3");
    expect(document["x-envelope"]).to.equal("jsonrpc-2.0");
    expect(document.info).to.deep.equal({ title: "Demo", version: "1.2.3" });
    expect(document.paths.echo?.post).to.deep.equal({
      operationId: "echo",
      summary: "Echo",
      description: "Returns its parameters",
      tags: ["demo"],
      requestBody: { content: { "application/json": { schema: { $ref: "#/components/schemas/EchoParams" } } } },
      responses: {
        "200": {
          description: "OK",
          content: { "application/json": { schema: { $ref: "#/components/schemas/Echoed" } } },
        },
      },
    });
    expect(document.components.schemas).to.have.all.keys("EchoParams", "Echoed");
    expect(document.components.schemas.EchoParams).to.have.nested.property("properties.a.type", "string");
    expect(document.components.schemas.EchoParams).to.not.have.property("$schema");
  });

  it("documents methods without output as 204", () => {
    const collector = new OpenApiCollector();
    const registry = new MethodRegistry({ collectors: [collector] });
    registry.register("system.reset", async () => undefined, undefined, undefined, { deprecated: true });

    const operation = collector.document().paths["system.reset"]?.post;

    expect(operation).to.deep.equal({
      operationId: "system.reset",
      deprecated: true,
      responses: { "204": { description: "No Content" } },
    });
    expect(collector.document().info).to.deep.equal({ title: "JSON-RPC API", version: "0.0.0" });
  });

  it("applies annotations registered for the method", () => {
    const collector = new OpenApiCollector();
    collector.annotate("echo", (operation) => {
      operation.description = "Overridden";
    });
    new MethodRegistry({ collectors: [collector] }).add(echo());

    expect(collector.document().paths.echo?.post.description).to.equal("Overridden");
  });

  it("feeds the payload schemas to the validator", () => {
    const validator = new JsonSchemaValidator();
    const collector = new OpenApiCollector({ validator });
    new MethodRegistry({ collectors: [collector] }).add(echo());

    expect(validator.hasSchema("echo", "params")).to.equal(true);
    expect(validator.hasSchema("echo", "result")).to.equal(true);
    expect(validator.validateParams("echo", { a: "abc", b: 1 })).to.equal(null);
    expect(validator.validateParams("echo", { a: "abc" })?.get("params")).to.deep.equal([
      "#: validation failed",
      "#: must have required property 'b'",
    ]);
  });

  it("leaves members outside the zod shape to the handler", async () => {
    const validator = new JsonSchemaValidator();
    const registry = new MethodRegistry({ collectors: [new OpenApiCollector({ validator })] });
    registry.add(echo());
    const dispatcher = new Dispatcher({ registry, validator });

    const response = await dispatcher.invoke({}, { jsonrpc: "2.0", method: "echo", params: { a: "abc", b: 5, c: 1 }, id: 1 });

    expect(toValidationSchema(EchoInput)).to.have.property("additionalProperties", true);
    expect(validator.validateParams("echo", { a: "abc", b: 5, c: 1 })).to.equal(null);
    expect(JSON.stringify(response)).to.equal('{"jsonrpc":"2.0","result":{"b":5,"a":"abc"},"id":1}');
  });

  it("keeps strict zod objects closed", () => {
    const Strict = payload(z.object({ a: z.string() }).strict());

    expect(toValidationSchema(Strict)).to.have.property("additionalProperties", false);
  });

  it("reports constraint violations of generated schemas as invalid parameters", async () => {
    const validator = new JsonSchemaValidator();
    const registry = new MethodRegistry({ collectors: [new OpenApiCollector({ validator })] });
    registry.add(
      new UseCase({
        name: "bounded",
        input: payload(z.object({ a: z.string().min(3), b: z.number().int().max(8) })),
        interact: async () => undefined,
      }),
    );
    const dispatcher = new Dispatcher({ registry, validator });

    const response = await dispatcher.invoke({}, { jsonrpc: "2.0", method: "bounded", params: { a: "a", b: 9 }, id: 1 });

    expect(response).to.deep.equal({
      jsonrpc: "2.0",
      error: {
        code: -32602,
        message: "invalid parameters",
        data: {
          error: "validation failed",
          context: {
            params: ["#/a: must NOT have fewer than 3 characters", "#/b: must be <= 8", "#: validation failed"],
          },
        },
      },
      id: 1,
    });
  });

  it("rethrows collection failures as registration errors", () => {
    const collector = new OpenApiCollector();
    collector.annotate("echo", () => {
      throw new Error("bad annotation");
    });
    const registry = new MethodRegistry({ collectors: [collector] });

    expect(() => registry.add(echo())).to.throw(
      RegistrationError,
      "failed to add to OpenAPI schema: echo: bad annotation",
    );
  });

  it("serialises to the document", () => {
    const collector = new OpenApiCollector();
    new MethodRegistry({ collectors: [collector] }).register("ping", async () => "pong");

    expect(JSON.parse(JSON.stringify(collector))).to.deep.equal(collector.document());
  });
});
