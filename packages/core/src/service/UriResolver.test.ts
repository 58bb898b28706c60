import { InvalidArgumentError, UriTemplateError } from "../errors/FluentRestErrors";
import { UriComponents } from "../uri/UriComponents";
import { UriResolver } from "./UriResolver";

describe("UriResolver", () => {
  const components = (): UriComponents => ({
    scheme: "https",
    host: "h.com",
    path: "/items",
    queryParams: new Map([["lang", ["en"]]]),
    fragment: "top",
  });

  describe("queryParam", () => {
    it("should append to existing values", () => {
      const uri = new UriResolver(components())
        .queryParam("lang", "de")
        .queryParam("page", 2)
        .toUriString();

      expect(uri).toBe("https://h.com/items?lang=en&lang=de&page=2#top");
    });

    it("should accept a list of values", () => {
      const uri = new UriResolver(components()).queryParam("tag", ["a", "b"]).toUriString();
      expect(uri).toBe("https://h.com/items?lang=en&tag=a&tag=b#top");
    });

    it("should ignore a call without values", () => {
      const uri = new UriResolver(components()).queryParam("page").toUriString();
      expect(uri).toBe("https://h.com/items?lang=en#top");
    });

    it("should reject a blank key", () => {
      expect(() => new UriResolver(components()).queryParam(" ", "x")).toThrow(
        InvalidArgumentError,
      );
    });
  });

  describe("queryParams", () => {
    it("should replace every accumulated param", () => {
      const uri = new UriResolver(components())
        .queryParam("page", 2)
        .queryParams({ q: "cats" })
        .toUriString();

      expect(uri).toBe("https://h.com/items?q=cats#top");
    });

    it("should leave params untouched for null", () => {
      const uri = new UriResolver(components()).queryParams(null).toUriString();
      expect(uri).toBe("https://h.com/items?lang=en#top");
    });
  });

  describe("fragment", () => {
    it("should override the fragment", () => {
      expect(new UriResolver(components()).fragment("bottom").toUriString()).toBe(
        "https://h.com/items?lang=en#bottom",
      );
    });

    it("should clear the fragment for null or empty", () => {
      expect(new UriResolver(components()).fragment(null).toUriString()).toBe(
        "https://h.com/items?lang=en",
      );
      expect(new UriResolver(components()).fragment("").toUriString()).toBe(
        "https://h.com/items?lang=en",
      );
    });
  });

  describe("uri variables", () => {
    const templated = (): UriComponents => ({
      scheme: "https",
      host: "h.com",
      path: "/users/{userId}/posts/{postId}",
      queryParams: new Map(),
    });

    it("should bind variables one by one or in bulk", () => {
      const uri = new UriResolver(templated())
        .uriVariable("userId", 7)
        .uriVariables({ postId: "first post" })
        .build();

      expect(uri).toBe("https://h.com/users/7/posts/first%20post");
    });

    it("should let a later binding win", () => {
      const uri = new UriResolver(templated())
        .uriVariables(new Map<string, unknown>([["userId", 1], ["postId", 2]]))
        .uriVariable("userId", 3)
        .toUriString();

      expect(uri).toBe("https://h.com/users/3/posts/2");
    });

    it("should throw when a placeholder stays unbound", () => {
      const resolver = new UriResolver(templated()).uriVariable("userId", 1);
      expect(() => resolver.build()).toThrow(UriTemplateError);
    });

    it("should reject a blank variable name", () => {
      expect(() => new UriResolver(templated()).uriVariable("", 1)).toThrow(
        InvalidArgumentError,
      );
    });
  });

  it("should not share state with the components it was built from", () => {
    const shared = components();
    new UriResolver(shared).queryParam("lang", "de").fragment(null);

    expect(shared.queryParams.get("lang")).toEqual(["en"]);
    expect(shared.fragment).toBe("top");
  });
});
