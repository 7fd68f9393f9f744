export const PYTHON_DIFF = `--- a/test.py
+++ b/test.py
@@ -1,2 +1,3 @@
 def test():
-    pass
+    x = 1
+    return x`;

export const MULTI_FILE_DIFF = `diff --git a/src/server.ts b/src/server.ts
index 3b18e51..a9c2f04 100644
--- a/src/server.ts
+++ b/src/server.ts
@@ -1,5 +1,7 @@
 import express from "express";
 
+const password = "test-secret";
+
 const app = express();
-app.listen(3000);
+// TODO: read the port from config
+app.listen(process.env.PORT || 3000);
diff --git a/src/util.ts b/src/util.ts
--- a/src/util.ts
+++ b/src/util.ts
@@ -10,3 +10,4 @@ export function trim(input: string) {
   return input.trim();
 }
+console.log("loaded");
@@ -40,2 +41,2 @@ export function lower(input: string) {
-  return input.toLowerCase()
+  return input.toLowerCase();
 }`;

export const BINARY_ONLY_DIFF = `diff --git a/logo.png b/logo.png
--- a/logo.png
+++ b/logo.png
Binary files a/logo.png and b/logo.png differ`;

export const SAMPLE_CONFIG_YAML = `
stages:
  rules: true
  llm:
    - security
    - logic
rules:
  no-todo:
    enabled: false
  max-file-size:
    maxLines: 300
llm:
  temperature: 0.2
timeouts:
  stageMs: 15000
`;
