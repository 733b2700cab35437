import moduleAlias from "module-alias";
import path from "path";

// compiled output keeps src/app's layout under dist/app
const basePath = path.extname(__filename) === ".js" ? "dist/app" : "src/app";
moduleAlias.addAliases({
  "@": path.join(process.cwd(), basePath),
});
