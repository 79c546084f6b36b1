/**
 * End-to-end checks of the JSON-RPC endpoint: framing, version enforcement,
 * the error mapping of every processing step and the middleware chain.
 */
import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { RegistrationError } from "../src/rpc/errors.js";
import type { Middleware } from "../src/rpc/middleware.js";
import { payload } from "../src/rpc/payload.js";
import { UseCase } from "../src/rpc/usecase.js";
import { JsonRpcEndpoint, createEndpoint } from "../src/server.js";
import { DEFAULT_ENDPOINT_SETTINGS } from "../src/serverOptions.js";
import { JsonSchemaValidator } from "../src/validation/jsonSchemaValidator.js";
import { failingStream } from "./helpers/http.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

interface EchoInput {
  a: string;
  b: number;
}

interface EchoOutput {
  b: number;
  a: string;
}

function buildEndpoint() {
  const calls: EchoInput[] = [];
  let middlewareRuns = 0;
  const counter: Middleware = (next) => ({
    async interact(ctx, input, output) {
      middlewareRuns += 1;
      return next.interact(ctx, input, output);
    },
  });
  const validator = new JsonSchemaValidator();
  const logger = new RecordingLogger();
  const endpoint = new JsonRpcEndpoint({ validator, middlewares: [counter], logger });

  endpoint.add(
    new UseCase<EchoInput, EchoOutput>({
      name: "echo",
      input: payload(z.object({ a: z.string(), b: z.number() })),
      output: payload(z.object({ b: z.number(), a: z.string() }), { create: () => ({ b: 0, a: "" }) }),
      interact: async (_ctx, input, output) => {
        calls.push(input);
        output.b = input.b;
        output.a = input.a;
      },
    }),
  );
  validator.addParamsSchema("echo", {
    type: "object",
    properties: { a: { type: "string", minLength: 3 }, b: { type: "integer", maximum: 8 } },
  });

  return { endpoint, logger, calls, middlewareRuns: () => middlewareRuns };
}

describe("json-rpc endpoint", () => {
  describe("single requests", () => {
    it("runs the middleware once per call, failures included", async () => {
      const { endpoint, middlewareRuns } = buildEndpoint();

      const success = await endpoint.handle('{"jsonrpc":"2.0","method":"echo","params":{"a":"abc","b":5},"id":1}');
      expect(success.body).to.equal('{"jsonrpc":"2.0","result":{"b":5,"a":"abc"},"id":1}');
      expect(middlewareRuns()).to.equal(1);

      const mistyped = await endpoint.handle('{"jsonrpc":"2.0","method":"echo","params":{"a":"abc","b":"invalid"},"id":1}');
      expect(mistyped.body).to.equal(
        '{"jsonrpc":"2.0","error":{"code":-32602,"message":"failed to unmarshal parameters","data":"b: Expected number, received string"},"id":1}',
      );
      expect(middlewareRuns()).to.equal(2);

      const invalid = await endpoint.handle('{"jsonrpc":"2.0","method":"echo","params":{"a":"a","b":9},"id":1}');
      expect(invalid.body).to.equal(
        '{"jsonrpc":"2.0","error":{"code":-32602,"message":"invalid parameters","data":{"error":"validation failed","context":{"params":["#/a: must NOT have fewer than 3 characters","#/b: must be <= 8","#: validation failed"]}}},"id":1}',
      );
      expect(middlewareRuns()).to.equal(3);
    });

    it("answers a null id", async () => {
      const { endpoint } = buildEndpoint();

      const reply = await endpoint.handle('{"jsonrpc":"2.0","method":"echo","params":{"a":"abc","b":1},"id":null}');

      expect(reply.body).to.equal('{"jsonrpc":"2.0","result":{"b":1,"a":"abc"},"id":null}');
    });

    it("runs notifications without answering them", async () => {
      const { endpoint, calls } = buildEndpoint();

      const reply = await endpoint.handle('{"jsonrpc":"2.0","method":"echo","params":{"a":"abc","b":2}}');

      expect(reply).to.deep.equal({ body: null });
      expect(calls).to.deep.equal([{ a: "abc", b: 2 }]);
    });

    it("logs the failures of notifications", async () => {
      const { endpoint, logger } = buildEndpoint();

      const reply = await endpoint.handle('{"jsonrpc":"2.0","method":"missing"}');

      expect(reply.body).to.equal(null);
      expect(logger.named("jsonrpc_notification_failed")).to.deep.equal([
        {
          level: "debug",
          message: "jsonrpc_notification_failed",
          payload: { method: "missing", code: -32601, message: "method not found: missing" },
        },
      ]);
    });

    it("answers unknown methods", async () => {
      const { endpoint } = buildEndpoint();

      const reply = await endpoint.handle('{"jsonrpc":"2.0","method":"missing","id":"m"}');

      expect(reply.body).to.equal('{"jsonrpc":"2.0","error":{"code":-32601,"message":"method not found: missing"},"id":"m"}');
    });

    it("rejects other protocol versions before reaching the method", async () => {
      const { endpoint, calls, logger } = buildEndpoint();

      const versioned = await endpoint.handle('{"jsonrpc":"1.0","method":"echo","params":{"a":"abc","b":1},"id":1}');
      const notification = await endpoint.handle('{"method":"echo","params":{"a":"abc","b":1}}');

      expect(versioned.body).to.equal('{"jsonrpc":"2.0","error":{"code":-32600,"message":"invalid jsonrpc value: \\"1.0\\""},"id":1}');
      expect(notification.body).to.equal('{"jsonrpc":"2.0","error":{"code":-32600,"message":"invalid jsonrpc value: \\"\\""},"id":null}');
      expect(calls).to.deep.equal([]);
      expect(logger.named("jsonrpc_request_rejected")).to.have.length(2);
    });

    it("rejects empty bodies", async () => {
      const { endpoint, logger } = buildEndpoint();

      const reply = await endpoint.handle(" \r\n\t");

      expect(reply.body).to.equal('{"jsonrpc":"2.0","error":{"code":-32700,"message":"empty body"},"id":null}');
      expect(logger.named("jsonrpc_request_rejected")).to.deep.equal([
        { level: "warn", message: "jsonrpc_request_rejected", payload: { code: -32700, message: "empty body" } },
      ]);
    });

    it("rejects bodies that are not a request object", async () => {
      const { endpoint } = buildEndpoint();

      const malformed = await endpoint.handle("{not json");
      const mistyped = await endpoint.handle('{"jsonrpc":2,"method":"echo","id":1}');
      const scalar = await endpoint.handle("42");

      expect(JSON.parse(malformed.body ?? "null")).to.have.nested.property("error.code", -32700);
      expect(JSON.parse(malformed.body ?? "null"))
        .to.have.nested.property("error.message")
        .that.matches(/^failed to unmarshal request: /);
      expect(mistyped.body).to.equal(
        '{"jsonrpc":"2.0","error":{"code":-32700,"message":"failed to unmarshal request: jsonrpc: Expected string, received number"},"id":null}',
      );
      expect(scalar.body).to.equal(
        '{"jsonrpc":"2.0","error":{"code":-32700,"message":"failed to unmarshal request: root: Expected object, received number"},"id":null}',
      );
    });

    it("treats a null body as an empty request", async () => {
      const { endpoint } = buildEndpoint();

      const reply = await endpoint.handle("null");

      expect(reply.body).to.equal(
        '{"jsonrpc":"2.0","error":{"code":-32600,"message":"invalid jsonrpc value: \\"\\""},"id":null}',
      );
    });

    it("accepts raw bytes", async () => {
      const { endpoint } = buildEndpoint();

      const reply = await endpoint.handle(
        new TextEncoder().encode('{"jsonrpc":"2.0","method":"echo","params":{"a":"héé","b":3},"id":9}'),
      );

      expect(reply.body).to.equal('{"jsonrpc":"2.0","result":{"b":3,"a":"héé"},"id":9}');
    });
  });

  describe("batches", () => {
    it("answers every request of a batch in order", async () => {
      const { endpoint } = buildEndpoint();

      const reply = await endpoint.handle(
        '  \n[{"jsonrpc":"2.0","method":"echo","params":{"a":"abc","b":1},"id":1},' +
          '{"jsonrpc":"2.0","method":"echo","params":{"a":"abc","b":2}},' +
          '{"jsonrpc":"1.0","method":"echo","id":3}]',
      );

      expect(reply.body).to.equal(
        '[{"jsonrpc":"2.0","result":{"b":1,"a":"abc"},"id":1},' +
          '{"jsonrpc":"2.0","error":{"code":-32600,"message":"invalid jsonrpc value: \\"1.0\\""},"id":3}]',
      );
    });

    it("answers notification-only batches with an empty list", async () => {
      const { endpoint } = buildEndpoint();

      const reply = await endpoint.handle('[{"jsonrpc":"2.0","method":"echo","params":{"a":"abc","b":2}}]');

      expect(reply.body).to.equal("[]");
    });

    it("drops null batch elements as empty notifications", async () => {
      const { endpoint } = buildEndpoint();

      const reply = await endpoint.handle('[null, {"jsonrpc":"2.0","method":"echo","params":{"a":"abc","b":2},"id":1}]');

      expect(reply.body).to.equal('[{"jsonrpc":"2.0","result":{"b":2,"a":"abc"},"id":1}]');
    });

    it("rejects undecodable batches as invalid requests", async () => {
      const { endpoint } = buildEndpoint();

      const reply = await endpoint.handle("[1, 2]");

      expect(JSON.parse(reply.body ?? "null")).to.deep.include({ jsonrpc: "2.0", id: null });
      expect(JSON.parse(reply.body ?? "null")).to.have.nested.property("error.code", -32600);
    });

    it("enforces the batch cap", async () => {
      const endpoint = new JsonRpcEndpoint({ maxBatchSize: 1 });

      const reply = await endpoint.handle('[{"jsonrpc":"2.0","method":"a","id":1},{"jsonrpc":"2.0","method":"b","id":2}]');

      expect(reply.body).to.equal(
        '{"jsonrpc":"2.0","error":{"code":-32600,"message":"batch of 2 requests exceeds the limit of 1"},"id":null}',
      );
    });
  });

  describe("streams", () => {
    it("reads the whole stream before dispatching", async () => {
      const { endpoint } = buildEndpoint();

      const reply = await endpoint.handleStream(
        (async function* () {
          yield '{"jsonrpc":"2.0","method":"echo",';
          yield '"params":{"a":"abc","b":4},"id":2}';
        })(),
      );

      expect(reply.body).to.equal('{"jsonrpc":"2.0","result":{"b":4,"a":"abc"},"id":2}');
    });

    it("maps read failures to parse errors", async () => {
      const { endpoint } = buildEndpoint();

      const reply = await endpoint.handleStream(failingStream(['{"jsonrpc"'], new Error("connection reset")));

      expect(reply.body).to.equal(
        '{"jsonrpc":"2.0","error":{"code":-32700,"message":"failed to read request body: connection reset"},"id":null}',
      );
    });

    it("enforces the body limit", async () => {
      const endpoint = new JsonRpcEndpoint({ maxBodyBytes: 8 });

      const reply = await endpoint.handleStream(failingStream(['{"jsonrpc":"2.0"}'], new Error("unreachable")));

      expect(reply.body).to.equal(
        '{"jsonrpc":"2.0","error":{"code":-32700,"message":"failed to read request body: payload exceeds 8 bytes"},"id":null}',
      );
    });
  });

  describe("lifecycle", () => {
    it("seals the registry on the first request", async () => {
      const { endpoint } = buildEndpoint();

      await endpoint.handle('{"jsonrpc":"2.0","method":"echo","params":{"a":"abc","b":1},"id":1}');

      expect(endpoint.registry.isSealed).to.equal(true);
      expect(() => endpoint.register("late", async () => undefined)).to.throw(RegistrationError);
    });

    it("builds endpoints from the environment settings", async () => {
      const logger = new RecordingLogger();
      const validator = new JsonSchemaValidator();
      const endpoint = createEndpoint(
        { validator, logger },
        { ...DEFAULT_ENDPOINT_SETTINGS, skipParamsValidation: true },
      );
      endpoint.register("count", async (_ctx, input) => input + 1, payload(z.number()));
      validator.addParamsSchema("count", { type: "string" });

      const reply = await endpoint.handle('{"jsonrpc":"2.0","method":"count","params":1,"id":1}');

      expect(reply.body).to.equal('{"jsonrpc":"2.0","result":2,"id":1}');
    });
  });
});
