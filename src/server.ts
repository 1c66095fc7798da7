// Load environment variables FIRST (before any other imports that might need them)
import "dotenv/config";

import { createApp } from "./app.js";
import { CACHE, GEOCODER } from "./config/constants.js";

const app = createApp();
const PORT = process.env.PORT || 3000;

// Start server
app.listen(PORT, () => {
  console.log("🚀 Server is running!");
  console.log(`📍 Port: ${PORT}`);
  console.log(`🌍 Environment: ${process.env.NODE_ENV}`);
  console.log(`🗺️  Geocoder: ${GEOCODER.PROVIDER}, cache: ${CACHE.DRIVER}`);
  console.log(`🔗 URL: http://localhost:${PORT}`);
  console.log("✅ Press CTRL+C to stop\n");
});

export default app;
