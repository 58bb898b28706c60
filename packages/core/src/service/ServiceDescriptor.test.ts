import { InvalidArgumentError } from "../errors/FluentRestErrors";
import { joinPath, ServiceDescriptor } from "./ServiceDescriptor";

describe("ServiceDescriptor", () => {
  const coolService = (): ServiceDescriptor =>
    new ServiceDescriptor({
      scheme: "https",
      host: "cool-service.com",
      endpoints: {
        getCoolStuff: "get/stuff/{stuffId}",
        postReminder: "reminder/set",
      },
    });

  describe("resolver", () => {
    it("should resolve an endpoint with its variables", () => {
      const uri = coolService()
        .resolver("getCoolStuff")
        .uriVariable("stuffId", "123")
        .build();

      expect(uri).toBe("https://cool-service.com/get/stuff/123");
    });

    it("should place context path and version before the endpoint", () => {
      const service = ServiceDescriptor.from("https://foo.com/context-path")
        .version("v1")
        .endpoint("bar", "bar");

      expect(service.resolver("bar").build()).toBe(
        "https://foo.com/context-path/v1/bar",
      );
    });

    it("should add the leading slash to a relative context path", () => {
      const service = new ServiceDescriptor({
        scheme: "https",
        host: "foo.com",
        contextPath: "context-path",
        version: "v1",
        endpoints: { bar: "bar" },
      });

      expect(service.resolver("bar").toUriString()).toBe(
        "https://foo.com/context-path/v1/bar",
      );
    });

    it("should render the port", () => {
      const service = new ServiceDescriptor({
        scheme: "http",
        host: "localhost",
        port: 8080,
        contextPath: "/svc",
      });

      expect(service.resolver().toUriString()).toBe("http://localhost:8080/svc");
    });

    it("should fall back to no endpoint segment for an unknown key", () => {
      expect(coolService().resolver("missing").toUriString()).toBe(
        "https://cool-service.com",
      );
    });

    it("should give every resolver its own copy of the defaults", () => {
      const service = coolService().commonQueryParam("apiKey", "test-key");
      service.resolver().queryParam("extra", "1");

      expect(service.resolver().toUriString()).toBe(
        "https://cool-service.com?apiKey=test-key",
      );
    });
  });

  describe("from", () => {
    it("should keep query and fragment of the URI as defaults", () => {
      const uri = ServiceDescriptor.from("https://search.example.com/api?lang=en#top")
        .endpoint("byTag", "tags/{tag}")
        .resolver("byTag")
        .uriVariable("tag", "ts")
        .toUriString();

      expect(uri).toBe("https://search.example.com/api/tags/ts?lang=en#top");
    });

    it("should accept a URL instance", () => {
      expect(ServiceDescriptor.from(new URL("https://h.com/x")).resolver().toUriString()).toBe(
        "https://h.com/x",
      );
    });

    it("should reject null and blank URIs", () => {
      expect(() => ServiceDescriptor.from(null)).toThrow("uri must not be null");
      expect(() => ServiceDescriptor.from("  ")).toThrow(InvalidArgumentError);
    });

    it.each([
      "http://localhost:80/api?a=1#f",
      "https://h.com:443/x",
      "https://h.com?x=1#f",
      "http://localhost:8080/svc/items?flag&page=2&page=3#top",
    ])("should build %s back as it was given", (uri) => {
      expect(ServiceDescriptor.from(uri).resolver().build()).toBe(uri);
    });
  });

  describe("relative references", () => {
    it("should build a rooted path without scheme and host", () => {
      const service = new ServiceDescriptor({
        contextPath: "context-path",
        version: "v1",
        endpoints: { foo: "bar" },
      });

      expect(service.resolver("foo").build()).toBe("/context-path/v1/bar");
    });

    it("should build from an empty descriptor", () => {
      expect(new ServiceDescriptor().endpoint("foo", "bar").resolver("foo").build()).toBe(
        "/bar",
      );
    });

    it("should keep query and fragment on a relative reference", () => {
      const uri = new ServiceDescriptor({ contextPath: "/api" })
        .commonQueryParam("page", 2)
        .commonFragment("top")
        .resolver()
        .build();

      expect(uri).toBe("/api?page=2#top");
    });
  });

  describe("setters", () => {
    it("should configure an empty descriptor step by step", () => {
      const service = new ServiceDescriptor()
        .scheme("http")
        .host("localhost")
        .port(8080)
        .contextPath("api")
        .version("v1")
        .endpoint("health", "health");

      expect(service.resolver("health").build()).toBe("http://localhost:8080/api/v1/health");
      expect(service.describe()).toEqual({
        scheme: "http",
        host: "localhost",
        port: "8080",
        contextPath: "api",
        version: "v1",
        endpoints: { health: "health" },
        commonQueryParams: {},
      });
    });

    it("should override parts taken from a URI", () => {
      const service = ServiceDescriptor.from("http://localhost:8080/svc").scheme("https").port(null);

      expect(service.resolver().build()).toBe("https://localhost/svc");
    });

    it("should remove a part set to a blank value", () => {
      const service = new ServiceDescriptor({ scheme: "https", host: "h.com", contextPath: "/svc" })
        .contextPath(" ")
        .host("");

      expect(service.describe()).toEqual({
        scheme: "https",
        endpoints: {},
        commonQueryParams: {},
      });
    });
  });

  describe("endpoints", () => {
    it("should reject blank keys and values", () => {
      expect(() => coolService().endpoint("", "x")).toThrow(InvalidArgumentError);
      expect(() => coolService().endpoint("k", " ")).toThrow(InvalidArgumentError);
      expect(() => coolService().endpoints(null)).toThrow("endpoints must not be null");
    });

    it("should replace an endpoint registered under the same key", () => {
      const service = coolService().endpoints(
        new Map([["getCoolStuff", "v2/stuff/{stuffId}"]]),
      );

      expect(service.describe().endpoints.getCoolStuff).toBe("v2/stuff/{stuffId}");
    });
  });

  describe("common query params", () => {
    it("should place call-time params after the common ones", () => {
      const uri = coolService()
        .commonQueryParam("apiKey", "test-key")
        .resolver("postReminder")
        .queryParam("q", "x")
        .toUriString();

      expect(uri).toBe("https://cool-service.com/reminder/set?apiKey=test-key&q=x");
    });

    it("should be dropped when a call replaces the query params", () => {
      const uri = coolService()
        .commonQueryParams({ apiKey: "test-key", lang: ["en", "de"] })
        .resolver("postReminder")
        .queryParams({ q: "x" })
        .toUriString();

      expect(uri).toBe("https://cool-service.com/reminder/set?q=x");
    });

    it("should reject null maps", () => {
      expect(() => coolService().commonQueryParams(null)).toThrow(InvalidArgumentError);
    });
  });

  describe("common fragment", () => {
    it("should be overridden or cleared per call", () => {
      const service = coolService().commonFragment("section");

      expect(service.resolver().toUriString()).toBe("https://cool-service.com#section");
      expect(service.resolver().fragment("other").toUriString()).toBe(
        "https://cool-service.com#other",
      );
      expect(service.resolver().fragment(null).toUriString()).toBe(
        "https://cool-service.com",
      );
    });
  });

  describe("describe", () => {
    it("should return the configured parts", () => {
      const service = new ServiceDescriptor({
        scheme: "https",
        host: "h",
        port: 8080,
        version: "v1",
        endpoints: { a: "x" },
      });

      expect(service.describe()).toEqual({
        scheme: "https",
        host: "h",
        port: "8080",
        version: "v1",
        endpoints: { a: "x" },
        commonQueryParams: {},
      });
    });
  });
});

describe("joinPath", () => {
  it("should trim outer slashes of every segment", () => {
    expect(joinPath("/api/", "/v2/", "items/")).toBe("/api/v2/items");
  });

  it("should skip blank segments and collapse repeated slashes", () => {
    expect(joinPath(undefined, undefined, "  ")).toBe("");
    expect(joinPath("//a", "b")).toBe("/a/b");
  });
});
