import {
  ConsoleLoggerProvider,
  EvaluationEventType,
  ExternalParameter,
  ExternalParameterValues,
  GizmoConfig,
  LogLevel,
  LoggerManager,
  connection,
  createInterpreter,
  external,
  withLoggerProvider,
  withOperations,
  withOptions,
} from 'gizmograph';
import type { EvaluationEvent, IGraphDefinition, IOperation } from 'gizmograph';
import { TestLoggerAdapter } from './utils/test-logger-adapter';
import { constantOperation, echoOperation, node, sumOperation } from './utils/test-operations';

const graph: IGraphDefinition = {
  nodes: [
    node('width', 'Const'),
    node(
      'area',
      'Sum',
      [
        { name: 'width', kind: connection('width', 'value') },
        { name: 'height', kind: external() },
      ],
      'sum'
    ),
  ],
};

const heightValues = () => new ExternalParameterValues().set(new ExternalParameter('area', 'height'), 4);

describe('Build API', () => {
  describe('createInterpreter', () => {
    it('should evaluate a plain graph definition', () => {
      const interpreter = createInterpreter(
        withOperations([constantOperation('Const', { value: 3 }), sumOperation()])
      );

      const result = interpreter.run(graph, 'area', heightValues());

      expect(result.renderable).toBe(7);
      expect(result.updatedGizmos).toBeUndefined();
      interpreter.destroy();
    });

    it('should default to empty external values and disabled gizmos', () => {
      const interpreter = createInterpreter(withOperations([constantOperation('Const', { value: 3 })]));

      const result = interpreter.run({ nodes: [node('width', 'Const', [], 'value')] }, 'width');

      expect(result.renderable).toBe(3);
      expect(result.updatedValues.size).toBe(0);
      expect(result.updatedGizmos).toBeUndefined();
    });

    it('should merge operations from several operators', () => {
      const interpreter = createInterpreter(
        withOperations([constantOperation('Const', {})]),
        withOperations([echoOperation()])
      );

      expect(interpreter.getOperationNames()).toEqual(['Const', 'Echo']);
      expect(interpreter.hasOperation('Echo')).toBe(true);
    });

    it('should reject duplicate operation names across operators', () => {
      expect(() =>
        createInterpreter(
          withOperations([constantOperation('Const', {})]),
          withOperations([constantOperation('Const', {})])
        )
      ).toThrow("withOperations: operation 'Const' is already registered");
    });

    it('should apply the renderable converter from options', () => {
      const interpreter = createInterpreter(
        withOperations([constantOperation('Const', { value: 3 }), sumOperation()]),
        withOptions({ toRenderable: value => ({ kind: 'scalar', value }) })
      );

      expect(interpreter.run(graph, 'area', heightValues()).renderable).toEqual({
        kind: 'scalar',
        value: 7,
      });
    });

    it('should pass gizmo configuration through', () => {
      const handle: IOperation<string> = {
        name: 'Handle',
        hasGizmo: true,
        call: () => ({ at: 1 }),
        postGizmo: outputs => [`handle@${String(outputs['at'])}`],
      };
      const interpreter = createInterpreter(withOperations([handle]));

      const result = interpreter.run(
        { nodes: [node('h', 'Handle')] },
        'h',
        new ExternalParameterValues(),
        GizmoConfig.out()
      );

      expect(result.updatedGizmos).toEqual(['handle@1']);
      expect(result.renderable).toBeUndefined();
    });

    it('should refuse to run after destroy', () => {
      const interpreter = createInterpreter(withOperations([constantOperation('Const', {})]));
      interpreter.destroy();

      expect(interpreter.destroyed).toBe(true);
      expect(() => interpreter.run({ nodes: [node('c', 'Const')] }, 'c')).toThrow(
        'Interpreter has been destroyed'
      );
    });
  });

  describe('Operator validation', () => {
    it('should reject an empty operation list', () => {
      expect(() => withOperations([])).toThrow('withOperations: operations must be a non-empty array');
    });

    it('should reject options without any setting', () => {
      expect(() => withOptions({})).toThrow(
        'withOptions: at least one of detectCycles, logLevel, or toRenderable must be provided'
      );
    });

    it('should let later options override earlier ones', () => {
      const interpreter = createInterpreter(
        withOperations([echoOperation()]),
        withOptions({ detectCycles: true }),
        withOptions({ detectCycles: false })
      );
      const cyclic = {
        nodes: [node('a', 'Echo', [{ name: 'v', kind: connection('a', 'v') }])],
      };

      expect(() => interpreter.run(cyclic, 'a')).toThrow(RangeError);
    });
  });

  describe('Providers', () => {
    it('should log through the logger provider at the configured level', () => {
      const logger = new TestLoggerAdapter(LogLevel.ERROR);
      const interpreter = createInterpreter(
        withOperations([constantOperation('Const', { value: 3 }), sumOperation()]),
        withLoggerProvider(logger),
        withOptions({ logLevel: LogLevel.DEBUG })
      );

      interpreter.run(graph, 'area', heightValues());

      expect(logger.getLevel()).toBe(LogLevel.DEBUG);
      expect(logger.messages.map(entry => entry.message)).toEqual([
        'Evaluating graph for target node area',
        'Running node width (Const)',
        'Running node area (Sum)',
        'Evaluated 2 node(s) for target node area',
      ]);
    });

    it('should apply the log level to the default logger without a provider', () => {
      const manager = LoggerManager.getInstance();
      const previous = manager.getLogger();
      const logger = new TestLoggerAdapter(LogLevel.OFF);
      manager.setLogger(logger);

      try {
        const interpreter = createInterpreter(
          withOperations([constantOperation('Const', { value: 3 }), sumOperation()]),
          withOptions({ logLevel: LogLevel.DEBUG })
        );
        interpreter.run(graph, 'area', heightValues());

        expect(logger.getLevel()).toBe(LogLevel.DEBUG);
        expect(logger.findMessage('Running node area (Sum)')?.level).toBe(LogLevel.DEBUG);
      } finally {
        manager.setLogger(previous);
      }
    });

    it('should record a timed event with the console logger provider', () => {
      const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
      const logger = new ConsoleLoggerProvider({ level: LogLevel.INFO });
      const interpreter = createInterpreter(
        withOperations([constantOperation('Const', { value: 3 }), sumOperation()]),
        withLoggerProvider(logger)
      );

      interpreter.run(graph, 'area', heightValues());

      const logs = logger.getLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatch(/INFO: \[EVENT\]\[evaluation\]\[run-graph\] \{"duration":"\d+\.\d{2}ms"\}$/);
      expect(info).toHaveBeenCalledTimes(1);
      info.mockRestore();
    });
  });

  describe('Events', () => {
    it('should publish the events of a pass in order', () => {
      const interpreter = createInterpreter(
        withOperations([constantOperation('Const', { value: 3 }), sumOperation()])
      );
      const events: EvaluationEvent[] = [];
      const subscription = interpreter.events$.subscribe(event => events.push(event));

      interpreter.run(graph, 'area', heightValues());

      expect(events).toEqual([
        { type: EvaluationEventType.EVALUATION_STARTED, args: ['area'] },
        { type: EvaluationEventType.NODE_EXECUTED, args: ['width', 'Const'] },
        { type: EvaluationEventType.NODE_EXECUTED, args: ['area', 'Sum'] },
        {
          type: EvaluationEventType.EVALUATION_COMPLETED,
          args: [{ targetNode: 'area', executedNodes: 2, hasRenderable: true }],
        },
      ]);
      subscription.unsubscribe();
    });

    it('should stop calling a handler after unsubscribe', () => {
      const interpreter = createInterpreter(
        withOperations([constantOperation('Const', { value: 3 }), sumOperation()])
      );
      const executed = jest.fn();
      const unsubscribe = interpreter.on(EvaluationEventType.NODE_EXECUTED, executed);

      interpreter.run(graph, 'area', heightValues());
      unsubscribe();
      interpreter.run(graph, 'area', heightValues());

      expect(executed).toHaveBeenCalledTimes(2);
      expect(executed).toHaveBeenNthCalledWith(1, 'width', 'Const');
    });

    it('should keep evaluating when a handler throws', () => {
      const interpreter = createInterpreter(
        withOperations([constantOperation('Const', { value: 3 }), sumOperation()])
      );
      interpreter.on(EvaluationEventType.NODE_EXECUTED, () => {
        throw new Error('handler failure');
      });

      expect(interpreter.run(graph, 'area', heightValues()).renderable).toBe(7);
    });

    it('should complete the event stream on destroy', () => {
      const interpreter = createInterpreter(withOperations([constantOperation('Const', {})]));
      const complete = jest.fn();
      interpreter.events$.subscribe({ complete });

      interpreter.destroy();

      expect(complete).toHaveBeenCalledTimes(1);
    });
  });
});
