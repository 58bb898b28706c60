import {
  InvalidArgumentError,
  UnsupportedOperationError,
  UriTemplateError,
} from "../errors/FluentRestErrors";
import { silentLogger } from "../lib/logger";
import { ServiceDescriptor } from "../service/ServiceDescriptor";
import { HttpMethod, HttpRequest, HttpResponse } from "../types/http";
import { FluentRestClient } from "./FluentRestClient";

describe("FluentRestClient", () => {
  let request: jest.Mock<Promise<HttpResponse>, [HttpRequest]>;
  let client: FluentRestClient;

  const coolService = (): ServiceDescriptor =>
    new ServiceDescriptor({
      scheme: "https",
      host: "cool-service.com",
      endpoints: {
        getCoolStuff: "get/stuff/{stuffId}",
        updateCoolStuff: "update/stuff/{stuffId}",
        postReminder: "reminder/set",
      },
    });

  const sentRequest = (): HttpRequest => request.mock.calls[0][0];

  beforeEach(() => {
    request = jest.fn<Promise<HttpResponse>, [HttpRequest]>().mockResolvedValue({
      status: 200,
      statusText: "OK",
      headers: { "content-type": "application/json" },
      data: { id: "123", name: "cool stuff" },
    });
    client = new FluentRestClient({ request }, { logger: silentLogger });
  });

  describe("GET from a service endpoint", () => {
    it("should resolve the endpoint and return the body", async () => {
      const stuff = await client
        .get()
        .from(coolService())
        .withEndpoint("getCoolStuff")
        .uriVariable("stuffId", "123")
        .executor()
        .accept("application/json")
        .executeForObject("json");

      expect(stuff).toEqual({ id: "123", name: "cool stuff" });
      expect(sentRequest().method).toBe("GET");
      expect(sentRequest().uri).toBe("https://cool-service.com/get/stuff/123");
      expect(sentRequest().headers).toEqual({ Accept: ["application/json"] });
      expect("body" in sentRequest()).toBe(false);
    });

    it("should resolve without an endpoint", async () => {
      await client.get().from(coolService()).withoutEndpoint().executor().execute();

      expect(sentRequest().uri).toBe("https://cool-service.com");
    });

    it("should treat a null endpoint key as no endpoint", async () => {
      await client.get().from(coolService()).withEndpoint(null).executor().execute();

      expect(sentRequest().uri).toBe("https://cool-service.com");
    });

    it("should send a relative URI for a descriptor without host", async () => {
      const local = new ServiceDescriptor({
        contextPath: "context-path",
        version: "v1",
        endpoints: { foo: "bar" },
      });

      await client.get().from(local).withEndpoint("foo").executor().execute();

      expect(sentRequest().uri).toBe("/context-path/v1/bar");
    });
  });

  describe("PUT into a service endpoint", () => {
    it("should send the body with call headers", async () => {
      const body = { name: "cooler stuff" };

      await client
        .put(body)
        .into(coolService())
        .withEndpoint("updateCoolStuff")
        .uriVariable("stuffId", "123")
        .executor()
        .header("locale", "de_DE")
        .execute();

      expect(sentRequest()).toEqual({
        method: "PUT",
        uri: "https://cool-service.com/update/stuff/123",
        headers: { locale: ["de_DE"] },
        body,
        responseType: "void",
      });
      expect(sentRequest().uri).toBe("https://cool-service.com/update/stuff/123");
    });
  });

  describe("direct URIs", () => {
    it("should accept a URI template string", async () => {
      await client
        .delete()
        .from("https://cool-service.com/stuff/{stuffId}")
        .uriVariable("stuffId", 42)
        .executor()
        .execute();

      expect(sentRequest().method).toBe("DELETE");
      expect(sentRequest().uri).toBe("https://cool-service.com/stuff/42");
    });

    it("should keep the query of a URL and append to it", async () => {
      await client
        .post({ text: "water the plants" })
        .into(new URL("https://cool-service.com/reminder/set?lang=en"))
        .queryParam("notify", true)
        .executor()
        .contentType("application/json")
        .execute();

      expect(sentRequest().uri).toBe(
        "https://cool-service.com/reminder/set?lang=en&notify=true",
      );
      expect(sentRequest().headers).toEqual({ "Content-Type": ["application/json"] });
    });

    it("should keep an explicit default port", async () => {
      await client.get().from("http://localhost:80/api?a=1#f").executor().execute();

      expect(sentRequest().uri).toBe("http://localhost:80/api?a=1#f");
    });

    it("should reject a blank URI", () => {
      expect(() => client.get().from("  ")).toThrow(InvalidArgumentError);
    });
  });

  describe("URI parts", () => {
    it("should append call params after common params", async () => {
      const service = coolService().commonQueryParam("apiKey", "test-key");

      await client
        .post({})
        .into(service)
        .withEndpoint("postReminder")
        .queryParam("tag", ["home", "garden"])
        .executor()
        .execute();

      expect(sentRequest().uri).toBe(
        "https://cool-service.com/reminder/set?apiKey=test-key&tag=home&tag=garden",
      );
    });

    it("should replace common params with queryParams", async () => {
      const service = coolService().commonQueryParam("apiKey", "test-key");

      await client
        .get()
        .from(service)
        .withEndpoint("postReminder")
        .queryParams({ page: 2 })
        .executor()
        .execute();

      expect(sentRequest().uri).toBe("https://cool-service.com/reminder/set?page=2");
    });

    it("should override and clear the common fragment", async () => {
      const service = coolService().commonFragment("details");

      await client.get().from(service).withEndpoint("postReminder").fragment("summary").executor().execute();
      await client.get().from(service).withEndpoint("postReminder").fragment(null).executor().execute();

      expect(request.mock.calls[0][0].uri).toBe(
        "https://cool-service.com/reminder/set#summary",
      );
      expect(request.mock.calls[1][0].uri).toBe("https://cool-service.com/reminder/set");
    });

    it("should bind variables in bulk", async () => {
      await client
        .get()
        .from("https://cool-service.com/{section}/{id}")
        .uriVariables({ section: "stuff", id: "a b" })
        .executor()
        .execute();

      expect(sentRequest().uri).toBe("https://cool-service.com/stuff/a%20b");
    });

    it("should fail at executor() when a variable is unbound", () => {
      const builder = client.get().from(coolService()).withEndpoint("getCoolStuff");

      expect(() => builder.executor()).toThrow(UriTemplateError);
      expect(request).not.toHaveBeenCalled();
    });
  });

  describe("unsupported methods", () => {
    const supported: readonly HttpMethod[] = ["GET", "POST", "PUT", "DELETE"];

    beforeEach(() => {
      client = new FluentRestClient(
        { request, supportsMethod: (method) => supported.includes(method) },
        { logger: silentLogger },
      );
    });

    it("should fail when PATCH is selected", () => {
      expect(() => client.patch({ name: "x" })).toThrow(UnsupportedOperationError);
      expect(() => client.patch()).toThrow(
        "PATCH method not supported by the configured HTTP adapter",
      );
      expect(request).not.toHaveBeenCalled();
    });

    it("should still allow supported methods", async () => {
      await client.put({}).into("https://cool-service.com/x").executor().execute();

      expect(sentRequest().method).toBe("PUT");
    });
  });

  describe("options", () => {
    it("should add default headers to every call", async () => {
      client = new FluentRestClient(
        { request },
        { logger: silentLogger, defaultHeaders: { "User-Agent": "reminder-service/1.0" } },
      );

      await client.get().from("https://cool-service.com/a").executor().header("locale", "en").execute();

      expect(sentRequest().headers).toEqual({
        "User-Agent": ["reminder-service/1.0"],
        locale: ["en"],
      });
    });
  });

  it("should keep chains independent", async () => {
    const first = client.get().from("https://cool-service.com/a").queryParam("x", 1);
    const second = client.get().from("https://cool-service.com/b");

    await second.executor().execute();
    await first.executor().execute();

    expect(request.mock.calls[0][0].uri).toBe("https://cool-service.com/b");
    expect(request.mock.calls[1][0].uri).toBe("https://cool-service.com/a?x=1");
  });
});
