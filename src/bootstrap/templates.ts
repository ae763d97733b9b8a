import type { Channel, Template } from "../config.js";

// ─── Editor ────────────────────────────────────────────────────────
export function vscodeSettings(): string {
  return (
    JSON.stringify(
      {
        "dart.flutterHotReloadOnSave": "all",
        "dart.lineLength": 100,
        "editor.formatOnSave": true,
        "editor.defaultFormatter": "Dart-Code.dart-code",
        "files.exclude": {
          "**/.dart_tool": true,
          "**/build": true,
        },
      },
      null,
      2
    ) + "\n"
  );
}

export function vscodeLaunch(): string {
  return (
    JSON.stringify(
      {
        version: "0.2.0",
        configurations: [
          { name: "Flutter Debug", request: "launch", type: "dart" },
          {
            name: "Flutter Profile",
            request: "launch",
            type: "dart",
            flutterMode: "profile",
          },
        ],
      },
      null,
      2
    ) + "\n"
  );
}

// ─── Makefile ──────────────────────────────────────────────────────
export function makefile(): string {
  return `.PHONY: get run run_ios run_android build analyze format test integration

get:
\tflutter pub get

run:
\tflutter run -d chrome

run_ios:
\tflutter run -d ios

run_android:
\tflutter run -d android

build:
\tflutter build apk

analyze:
\tflutter analyze

format:
\tdart format .

test:
\tflutter test

integration:
\tflutter test integration_test
`;
}

// ─── Tests ─────────────────────────────────────────────────────────
export function unitTest(): string {
  return `import 'package:flutter_test/flutter_test.dart';

void main() {
  test('sanity check', () {
    expect(1 + 1, equals(2));
  });
}
`;
}

/**
 * App projects pump the generated `MyApp`; plugin projects have no
 * `lib/main.dart`, so their smoke test pumps a bare `MaterialApp`.
 */
export function widgetTest(packageName: string, template: Template): string {
  if (template === "plugin") {
    return `import 'package:flutter/material.dart';
import 'package:flutter_test/flutter_test.dart';

void main() {
  testWidgets('renders a material app', (tester) async {
    await tester.pumpWidget(const MaterialApp(home: Text('ok')));
    expect(find.text('ok'), findsOneWidget);
  });
}
`;
  }
  return `import 'package:flutter_test/flutter_test.dart';
import 'package:${packageName}/main.dart';

void main() {
  testWidgets('App loads without errors', (tester) async {
    await tester.pumpWidget(const MyApp());
    expect(find.byType(MyApp), findsOneWidget);
  });
}
`;
}

export function integrationTest(packageName: string, template: Template): string {
  const pumped =
    template === "plugin"
      ? `    await tester.pumpWidget(const MaterialApp(home: Text('ok')));
    expect(find.text('ok'), findsOneWidget);`
      : `    await tester.pumpWidget(const MyApp());
    expect(find.byType(MyApp), findsOneWidget);`;
  const appImport =
    template === "plugin"
      ? "import 'package:flutter/material.dart';"
      : `import 'package:${packageName}/main.dart';`;
  return `import 'package:flutter_test/flutter_test.dart';
import 'package:integration_test/integration_test.dart';
${appImport}

void main() {
  IntegrationTestWidgetsFlutterBinding.ensureInitialized();

  testWidgets('home page renders', (tester) async {
${pumped}
  });
}
`;
}

// ─── Lint & CI ─────────────────────────────────────────────────────
export function analysisOptions(): string {
  return `include: package:flutter_lints/flutter.yaml

linter:
  rules:
    avoid_print: false
    prefer_const_constructors: true
`;
}

export function ciWorkflow(channel: Channel): string {
  return `name: Flutter CI

on:
  push:
    branches: [ main ]
  pull_request:

jobs:
  build:
    runs-on: macos-latest
    steps:
      - uses: actions/checkout@v4
      - uses: subosito/flutter-action@v2
        with:
          channel: '${channel}'
      - run: flutter pub get
      - run: dart format --output=none --set-exit-if-changed .
      - run: flutter analyze
      - run: flutter test
`;
}

// ─── Environment & docs ────────────────────────────────────────────
export function envFile(): string {
  return `# Example environment variables
API_URL=https://api.example.com
`;
}

export function readme(projectName: string): string {
  return `# ${projectName}

Flutter app scaffolded with flutter-kickstart.

## Quickstart
\`\`\`bash
flutter pub get
make run            # runs on Chrome by default
\`\`\`

## Testing
\`\`\`bash
make test           # unit + widget tests
make integration    # integration_test/
\`\`\`

## Linting
\`\`\`bash
make analyze
\`\`\`

## Env vars
Edit \`.env\` and access with \`dotenv.env['KEY']\` after startup.
`;
}

// ─── main.dart patch ───────────────────────────────────────────────
export const DOTENV_MARKER = "flutter_dotenv";
export const DOTENV_IMPORT = "import 'package:flutter_dotenv/flutter_dotenv.dart';";
export const MAIN_SIGNATURE = "void main() {";
export const ASYNC_MAIN = `Future<void> main() async {
  WidgetsFlutterBinding.ensureInitialized();
  await dotenv.load(fileName: ".env");`;
