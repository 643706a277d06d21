import { detectImageType, detectModelType } from "@/lib/generationProviders/contentTypes";
import { glbBytes, pngBytes } from "../../helpers/fakeFetch";

describe("detectImageType", () => {
  it("trusts a known image header", () => {
    expect(detectImageType("image/jpg; charset=binary", new Uint8Array([1]))).toEqual({
      contentType: "image/jpeg",
      extension: "jpg",
    });
  });

  it("sniffs PNG bytes sent as octet-stream", () => {
    expect(detectImageType("application/octet-stream", pngBytes())).toEqual({
      contentType: "image/png",
      extension: "png",
    });
  });

  it("rejects non-image types", () => {
    expect(detectImageType("text/html", pngBytes())).toBeNull();
  });
});

describe("detectModelType", () => {
  it("maps known mesh types", () => {
    expect(detectModelType("model/obj", new Uint8Array([1]))).toEqual({ contentType: "model/obj", extension: "obj" });
  });

  it("uses the source URL extension", () => {
    expect(detectModelType("text/plain", new Uint8Array([1]), "http://files.test/a/mesh.gltf")).toEqual({
      contentType: "model/gltf+json",
      extension: "gltf",
    });
  });

  it("recognises the glTF binary magic", () => {
    expect(detectModelType("application/x-unknown", glbBytes())).toEqual({
      contentType: "model/gltf-binary",
      extension: "glb",
    });
  });

  it("defaults unlabelled binaries to GLB", () => {
    expect(detectModelType("application/octet-stream", new Uint8Array([1, 2]))).toEqual({
      contentType: "model/gltf-binary",
      extension: "glb",
    });
  });

  it("rejects other types", () => {
    expect(detectModelType("text/plain", new Uint8Array([1, 2]))).toBeNull();
  });
});
